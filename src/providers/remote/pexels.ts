import { z } from 'zod';
import { retryable, success } from '../types.js';
import type { Asset, AssetProvider, AssetQueryOptions, CallContext, FetchFn, ProviderResult } from '../types.js';
import { requestJson } from './http.js';

export const PEXELS_VIDEO_SEARCH_URL = 'https://api.pexels.com/videos/search';

const VideoFileSchema = z.object({
  link: z.string().url(),
  width: z.number().nullable().optional(),
  height: z.number().nullable().optional(),
});

const SearchResponseSchema = z.object({
  videos: z.array(
    z.object({
      duration: z.number().optional(),
      width: z.number().optional(),
      height: z.number().optional(),
      video_files: z.array(VideoFileSchema),
    }),
  ),
});

type VideoFile = z.infer<typeof VideoFileSchema>;

/** Smallest rendition that is still at least 720 wide, else the largest. */
function pickFile(files: VideoFile[]): VideoFile | undefined {
  const sized = [...files].sort((a, b) => (a.width ?? 0) - (b.width ?? 0));
  return sized.find((f) => (f.width ?? 0) >= 720) ?? sized[sized.length - 1];
}

export class PexelsAssetProvider implements AssetProvider {
  readonly id = 'pexels';

  constructor(private readonly opts: { apiKey: string; fetch: FetchFn }) {}

  async gather(query: string, options: AssetQueryOptions, ctx: CallContext): Promise<ProviderResult<Asset[]>> {
    const url = new URL(PEXELS_VIDEO_SEARCH_URL);
    url.searchParams.set('query', query);
    url.searchParams.set('per_page', String(options.limit));
    url.searchParams.set('orientation', options.orientation ?? 'portrait');

    const result = await requestJson(
      this.opts.fetch,
      url.toString(),
      { headers: { Authorization: this.opts.apiKey } },
      SearchResponseSchema,
      ctx.signal,
      'pexels',
    );
    if (result.kind !== 'success') return result;

    const assets: Asset[] = [];
    for (const video of result.value.videos) {
      const file = pickFile(video.video_files);
      if (!file) continue;
      assets.push({
        url: file.link,
        kind: 'video',
        license: 'Pexels License',
        durationSeconds: video.duration,
        width: file.width ?? video.width,
        height: file.height ?? video.height,
      });
    }
    if (assets.length === 0) return retryable(`pexels found no footage for "${query}"`);
    return success(assets.slice(0, options.limit));
  }
}
