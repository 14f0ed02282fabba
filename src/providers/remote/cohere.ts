import { z } from 'zod';
import { fatal, success } from '../types.js';
import type { CallContext, FetchFn, ProviderResult, Script, ScriptProvider } from '../types.js';
import { requestJson } from './http.js';

export const COHERE_GENERATE_URL = 'https://api.cohere.ai/v1/generate';

const GenerateResponseSchema = z.object({
  generations: z.array(z.object({ text: z.string() })).min(1),
});

export interface CohereOptions {
  apiKey: string;
  fetch: FetchFn;
  maxTitleLength: number;
  hashtags: string[];
  model?: string;
}

/**
 * Parse "Title: ..." followed by the narration. Without a title line the
 * first sentence becomes the title.
 */
export function parseGeneratedScript(text: string): { title: string; content: string } | null {
  const lines = text.split('\n').map((l) => l.trim()).filter(Boolean);
  const titleIdx = lines.findIndex((l) => /^title\s*:/i.test(l));
  if (titleIdx >= 0) {
    const title = (lines[titleIdx] ?? '').replace(/^title\s*:\s*/i, '').replace(/^"|"$/g, '');
    const content = lines
      .filter((_, i) => i !== titleIdx)
      .map((l) => l.replace(/^(script|narration)\s*:\s*/i, ''))
      .join(' ')
      .trim();
    return title && content ? { title, content } : null;
  }
  const content = lines.join(' ').trim();
  if (!content) return null;
  const first = content.split(/(?<=[.!?])\s/)[0] ?? content;
  return { title: first.replace(/[.!?]+$/, ''), content };
}

export class CohereScriptProvider implements ScriptProvider {
  readonly id = 'cohere';

  constructor(private readonly opts: CohereOptions) {}

  async generate(topic: string, durationSeconds: number, ctx: CallContext): Promise<ProviderResult<Script>> {
    const words = Math.round(durationSeconds * 2);
    const prompt = [
      `Write a ${durationSeconds}-second YouTube Shorts narration about "${topic}".`,
      `Use about ${words} words. Open with a one-line hook, speak to the viewer as "you",`,
      'and end with a call to follow the channel.',
      'Answer as:',
      'Title: <catchy title>',
      '<narration>',
    ].join('\n');
    return this.complete(prompt, durationSeconds, ctx);
  }

  async improve(script: Script, feedback: string[], ctx: CallContext): Promise<ProviderResult<Script>> {
    const prompt = [
      'Rewrite this YouTube Shorts narration, keeping its topic and length.',
      'Fix the following:',
      ...feedback.map((f) => `- ${f}`),
      '',
      `Title: ${script.title}`,
      script.content,
      '',
      'Answer as:',
      'Title: <title>',
      '<narration>',
    ].join('\n');
    return this.complete(prompt, script.durationSeconds, ctx);
  }

  private async complete(prompt: string, durationSeconds: number, ctx: CallContext): Promise<ProviderResult<Script>> {
    const result = await requestJson(
      this.opts.fetch,
      COHERE_GENERATE_URL,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.opts.model ?? 'command',
          prompt,
          max_tokens: 400,
          temperature: 0.7,
        }),
      },
      GenerateResponseSchema,
      ctx.signal,
      'cohere',
    );
    if (result.kind !== 'success') return result;

    const parsed = parseGeneratedScript(result.value.generations[0]?.text ?? '');
    if (!parsed) return fatal('cohere returned an empty script');
    return success({
      title: parsed.title.slice(0, this.opts.maxTitleLength),
      content: parsed.content,
      durationSeconds,
      hashtags: [...this.opts.hashtags],
      generator: this.id,
    });
  }
}
