import { registerProvider } from './registry.js';
import { SimpleTrendProvider } from './simple/trend.js';
import { SimpleScriptProvider } from './simple/script.js';
import { SimpleAssetProvider } from './simple/asset.js';
import { SimpleThumbnailProvider, SimpleVideoProvider, SimpleVoiceoverProvider } from './simple/media.js';
import { CohereScriptProvider } from './remote/cohere.js';
import { PexelsAssetProvider } from './remote/pexels.js';
import { ElevenLabsVoiceoverProvider } from './remote/elevenlabs.js';
import { LocalUploader } from '../connector/local/uploader.js';
import { YouTubeUploader } from '../connector/youtube/uploader.js';

let registered = false;

/**
 * Register every built-in provider. Idempotent; called by ProviderFactory.build.
 */
export function registerBuiltinProviders(): void {
  if (registered) return;
  registered = true;

  registerProvider('trend', 'simple', () => new SimpleTrendProvider());
  registerProvider('script', 'simple', ({ config }) => new SimpleScriptProvider(config));
  registerProvider('asset', 'simple', () => new SimpleAssetProvider());
  registerProvider('voiceover', 'simple', () => new SimpleVoiceoverProvider());
  registerProvider('video', 'simple', () => new SimpleVideoProvider());
  registerProvider('thumbnail', 'simple', () => new SimpleThumbnailProvider());

  registerProvider('script', 'cohere', ({ config, credentials, fetch }) =>
    credentials.cohereApiKey
      ? new CohereScriptProvider({
          apiKey: credentials.cohereApiKey,
          fetch,
          maxTitleLength: config.content.max_title_length,
          hashtags: config.content.default_hashtags,
        })
      : null,
  );
  registerProvider('asset', 'pexels', ({ credentials, fetch }) =>
    credentials.pexelsApiKey ? new PexelsAssetProvider({ apiKey: credentials.pexelsApiKey, fetch }) : null,
  );
  registerProvider('voiceover', 'elevenlabs', ({ credentials, fetch }) =>
    credentials.elevenLabsApiKey
      ? new ElevenLabsVoiceoverProvider({ apiKey: credentials.elevenLabsApiKey, fetch })
      : null,
  );

  registerProvider('upload', 'local', ({ paths }) => new LocalUploader(paths.uploadedDir));
  registerProvider('upload', 'youtube', ({ config, credentials, fetch }) =>
    credentials.youtubeAccessToken
      ? new YouTubeUploader({
          accessToken: credentials.youtubeAccessToken,
          categoryId: config.youtube.category_id,
          privacy: config.youtube.default_privacy,
          maxTitleLength: config.content.max_title_length,
          fetch,
        })
      : null,
  );
}
