import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createHash } from 'node:crypto';
import { success } from '../../providers/types.js';
import type { CallContext, ProviderResult, Uploader, UploadRequest } from '../../providers/types.js';

/**
 * "Publishes" into a local directory, one folder per channel. The external id
 * is derived from the video bytes so re-publishing the same file is stable.
 */
export class LocalUploader implements Uploader {
  readonly id = 'local';

  constructor(private readonly uploadedDir: string) {}

  async upload(request: UploadRequest, ctx: CallContext): Promise<ProviderResult<string>> {
    const digest = createHash('sha256').update(await readFile(request.videoPath)).digest('hex');
    const externalId = `local-${digest.slice(0, 11)}`;
    const dir = join(this.uploadedDir, request.channel, externalId);
    await mkdir(dir, { recursive: true });
    await copyFile(request.videoPath, join(dir, basename(request.videoPath)));
    if (request.thumbnailPath) {
      await copyFile(request.thumbnailPath, join(dir, basename(request.thumbnailPath)));
    }
    ctx.signal.throwIfAborted();
    return success(externalId);
  }
}
