/**
 * YouTube uploader: the two-step resumable upload (metadata POST, then the
 * video bytes PUT to the returned session URI).
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { isRetryableStatus } from '../../providers/remote/http.js';
import { fatal, retryable, success } from '../../providers/types.js';
import type { CallContext, FetchFn, ProviderResult, Script, Uploader, UploadRequest } from '../../providers/types.js';
import { errorMessage } from '../../shared/errors.js';

export const YOUTUBE_UPLOAD_URL =
  'https://www.googleapis.com/upload/youtube/v3/videos?uploadType=resumable&part=snippet,status';

export type Privacy = 'public' | 'private' | 'unlisted';

export interface YouTubeUploaderOptions {
  accessToken: string;
  categoryId: string;
  privacy: Privacy;
  maxTitleLength: number;
  fetch: FetchFn;
}

export interface VideoPackage {
  title: string;
  description: string;
  tags: string[];
  category_id: string;
  privacy: Privacy;
}

const UploadResponseSchema = z.object({ id: z.string().min(1) });

/** Metadata for a Short: `#shorts` in the title, narration and hashtags in the description. */
export function packageVideo(script: Script, opts: Pick<YouTubeUploaderOptions, 'categoryId' | 'privacy' | 'maxTitleLength'>): VideoPackage {
  const hasShortsTag = /#shorts\b/i.test(script.title);
  const suffix = hasShortsTag ? '' : ' #shorts';
  const title = script.title.slice(0, Math.max(0, opts.maxTitleLength - suffix.length)) + suffix;
  return {
    title,
    description: [script.content, '', script.hashtags.join(' ')].join('\n').trim(),
    tags: script.hashtags.map((h) => h.replace(/^#/, '')).filter(Boolean),
    category_id: opts.categoryId,
    privacy: opts.privacy,
  };
}

export class YouTubeUploader implements Uploader {
  readonly id = 'youtube';

  constructor(private readonly opts: YouTubeUploaderOptions) {}

  async upload(request: UploadRequest, ctx: CallContext): Promise<ProviderResult<string>> {
    const pkg = packageVideo(request.script, this.opts);
    const http = this.opts.fetch;

    let video: Buffer;
    try {
      video = await readFile(request.videoPath);
    } catch (err) {
      return fatal(`cannot read video ${request.videoPath}: ${errorMessage(err)}`);
    }

    const init = await this.call(
      () =>
        http(YOUTUBE_UPLOAD_URL, {
          method: 'POST',
          signal: ctx.signal,
          headers: {
            Authorization: `Bearer ${this.opts.accessToken}`,
            'Content-Type': 'application/json',
            'X-Upload-Content-Type': 'video/*',
          },
          body: JSON.stringify({
            snippet: {
              title: pkg.title,
              description: pkg.description,
              tags: pkg.tags,
              categoryId: pkg.category_id,
            },
            status: { privacyStatus: pkg.privacy, selfDeclaredMadeForKids: false },
          }),
        }),
      ctx.signal,
      'youtube upload initiation',
    );
    if (init.kind !== 'success') return init;

    const uploadUri = init.value.headers.get('Location');
    if (!uploadUri) return fatal('youtube returned no upload URI');

    const upload = await this.call(
      () =>
        http(uploadUri, {
          method: 'PUT',
          signal: ctx.signal,
          headers: {
            Authorization: `Bearer ${this.opts.accessToken}`,
            'Content-Type': 'video/*',
          },
          body: video,
        }),
      ctx.signal,
      'youtube video upload',
    );
    if (upload.kind !== 'success') return upload;

    // The bytes are already published; anything wrong from here on must not be retried.
    let body: unknown;
    try {
      body = await upload.value.json();
    } catch {
      return fatal('youtube upload response was not JSON');
    }
    const parsed = UploadResponseSchema.safeParse(body);
    if (!parsed.success) return fatal('youtube upload response had no video id');
    return success(parsed.data.id);
  }

  private async call(
    send: () => Promise<Response>,
    signal: AbortSignal,
    label: string,
  ): Promise<ProviderResult<Response>> {
    let resp: Response;
    try {
      resp = await send();
    } catch (err) {
      if (signal.aborted) throw signal.reason ?? err;
      return retryable(`${label} failed: ${errorMessage(err)}`);
    }
    if (!resp.ok) {
      const reason = `${label} failed: ${resp.status}`;
      return isRetryableStatus(resp.status) ? retryable(reason) : fatal(reason);
    }
    return success(resp);
  }
}
