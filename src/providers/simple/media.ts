import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { success } from '../types.js';
import type {
  AssembleRequest,
  CallContext,
  ProviderResult,
  ThumbnailProvider,
  ThumbnailRequest,
  VideoProvider,
  VoiceoverOptions,
  VoiceoverProvider,
} from '../types.js';
import { WORDS_PER_SECOND } from '../../quality/gate.js';
import { tokenizeWords } from '../../quality/text.js';

const SAMPLE_RATE = 8000;

/** 8-bit mono PCM WAV of silence. */
export function silentWav(seconds: number): Buffer {
  const samples = Math.max(1, Math.round(seconds * SAMPLE_RATE));
  const buf = Buffer.alloc(44 + samples, 0x80);
  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + samples, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(1, 22); // mono
  buf.writeUInt32LE(SAMPLE_RATE, 24);
  buf.writeUInt32LE(SAMPLE_RATE, 28);
  buf.writeUInt16LE(1, 32);
  buf.writeUInt16LE(8, 34);
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(samples, 40);
  return buf;
}

export function narrationSeconds(text: string): number {
  return Math.max(1, Math.ceil(tokenizeWords(text).length / WORDS_PER_SECOND));
}

async function writeOutput(path: string, data: string | Buffer): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  return path;
}

/** Silent narration track of the length the text would take to read aloud. */
export class SimpleVoiceoverProvider implements VoiceoverProvider {
  readonly id = 'simple';

  async synthesize(text: string, options: VoiceoverOptions, _ctx: CallContext): Promise<ProviderResult<string>> {
    return success(await writeOutput(`${options.outputBase}.wav`, silentWav(narrationSeconds(text))));
  }
}

export interface RenderManifest {
  version: 1;
  title: string;
  durationSeconds: number;
  narration: string;
  audio: string;
  clips: Array<{ source: string; start: number; end: number }>;
  captions: string;
  branding: AssembleRequest['branding'];
}

/**
 * Writes a render manifest (timeline of clips, narration and branding) for an
 * external renderer instead of encoding video itself.
 */
export class SimpleVideoProvider implements VideoProvider {
  readonly id = 'simple';

  async assemble(request: AssembleRequest, ctx: CallContext): Promise<ProviderResult<string>> {
    const duration = request.script.durationSeconds;
    const clipCount = Math.max(1, request.assets.length);
    const clipLength = duration / clipCount;
    const sources = request.assets.length ? request.assets.map((a) => a.url) : ['placeholder://blank'];
    const manifest: RenderManifest = {
      version: 1,
      title: request.script.title,
      durationSeconds: duration,
      narration: request.script.content,
      audio: request.voiceoverPath,
      clips: sources.map((source, i) => ({
        source,
        start: Math.round(i * clipLength * 100) / 100,
        end: Math.round((i + 1) * clipLength * 100) / 100,
      })),
      captions: request.script.content,
      branding: request.branding,
    };
    await writeOutput(join(ctx.workDir, 'clips.txt'), manifest.clips.map((c) => `file '${c.source}'`).join('\n'));
    return success(await writeOutput(`${request.outputBase}.render.json`, JSON.stringify(manifest, null, 2)));
  }
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Wrap text into lines of at most `width` characters. */
export function wrapTitle(title: string, width = 18): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of title.split(/\s+/).filter(Boolean)) {
    if (current && current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/** 1080x1920 SVG thumbnail: title over the channel's primary colour. */
export class SimpleThumbnailProvider implements ThumbnailProvider {
  readonly id = 'simple';

  async render(request: ThumbnailRequest, _ctx: CallContext): Promise<ProviderResult<string>> {
    const background = request.colorScheme[0] ?? '#000000';
    const foreground = request.colorScheme[1] ?? '#FFFFFF';
    const lines = wrapTitle(request.title);
    const top = 960 - ((lines.length - 1) * 120) / 2;
    const text = lines
      .map((line, i) => `  <text x="540" y="${top + i * 120}">${escapeXml(line)}</text>`)
      .join('\n');
    const svg = [
      '<svg xmlns="http://www.w3.org/2000/svg" width="1080" height="1920" viewBox="0 0 1080 1920">',
      `  <rect width="1080" height="1920" fill="${escapeXml(background)}"/>`,
      `  <g fill="${escapeXml(foreground)}" font-family="sans-serif" font-size="96" font-weight="bold" text-anchor="middle">`,
      text,
      '  </g>',
      '</svg>',
      '',
    ].join('\n');
    return success(await writeOutput(`${request.outputBase}.svg`, svg));
  }
}
