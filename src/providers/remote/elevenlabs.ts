import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { fatal, success } from '../types.js';
import type { CallContext, FetchFn, ProviderResult, VoiceoverOptions, VoiceoverProvider } from '../types.js';
import { requestBytes } from './http.js';

export const ELEVENLABS_TTS_URL = 'https://api.elevenlabs.io/v1/text-to-speech';

/** Voice used when a channel's branding keeps the "default" voice id. */
export const ELEVENLABS_DEFAULT_VOICE = '21m00Tcm4TlvDq8ikWAM';

export class ElevenLabsVoiceoverProvider implements VoiceoverProvider {
  readonly id = 'elevenlabs';

  constructor(private readonly opts: { apiKey: string; fetch: FetchFn; modelId?: string }) {}

  async synthesize(text: string, options: VoiceoverOptions, ctx: CallContext): Promise<ProviderResult<string>> {
    const voice = options.voiceId === 'default' ? ELEVENLABS_DEFAULT_VOICE : options.voiceId;
    const result = await requestBytes(
      this.opts.fetch,
      `${ELEVENLABS_TTS_URL}/${encodeURIComponent(voice)}`,
      {
        method: 'POST',
        headers: {
          'xi-api-key': this.opts.apiKey,
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({
          text,
          model_id: this.opts.modelId ?? 'eleven_monolingual_v1',
          voice_settings: { stability: 0.5, similarity_boost: 0.75 },
        }),
      },
      ctx.signal,
      'elevenlabs',
    );
    if (result.kind !== 'success') return result;
    if (result.value.length === 0) return fatal('elevenlabs returned empty audio');

    const path = `${options.outputBase}.mp3`;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, result.value);
    return success(path);
  }
}
