import { stableIndex } from '../../shared/ids.js';
import { success } from '../types.js';
import type { CallContext, ProviderResult, Script, ScriptProvider } from '../types.js';
import type { StudioConfig } from '../../workspace/types.js';
import { WORDS_PER_SECOND } from '../../quality/gate.js';
import { tokenizeWords } from '../../quality/text.js';

const HOOKS = [
  (topic: string) => `Did you know about ${topic}?`,
  (topic: string) => `Here's the surprising truth about ${topic}.`,
  (topic: string) => `Here's a quick explainer about ${topic}.`,
];

const BODY = [
  (topic: string) => `Most people only know the basics of ${topic}, but there is more to it.`,
  (topic: string) => `Experts have studied ${topic} for years, and the details keep surprising them.`,
  (topic: string) => `Once you notice ${topic} in everyday life, you start to see it everywhere.`,
  () => `The key idea is simple, and you can explain it to a friend in 3 sentences.`,
  (topic: string) => `Small details about ${topic} often matter more than the big headlines.`,
];

const CTA = (topic: string) => `Follow for more quick facts about ${topic}!`;
const CTA_PATTERN = /\b(subscribe|follow|like|comment|share)\b/i;

/** Words per second of target duration the template fills before stopping. */
const FILL_RATIO = 0.7;

function wordCount(parts: string[]): number {
  return parts.reduce((n, p) => n + tokenizeWords(p).length, 0);
}

/**
 * Template script writer. Always succeeds; the last-resort fallback for the
 * script capability.
 */
export class SimpleScriptProvider implements ScriptProvider {
  readonly id = 'simple';

  constructor(private readonly config: StudioConfig) {}

  async generate(topic: string, durationSeconds: number, _ctx: CallContext): Promise<ProviderResult<Script>> {
    const hook = HOOKS[stableIndex(topic, HOOKS.length)] ?? HOOKS[0];
    const parts = [hook ? hook(topic) : topic];
    const target = durationSeconds * WORDS_PER_SECOND * FILL_RATIO;
    for (const line of BODY) {
      if (wordCount(parts) >= target) break;
      parts.push(line(topic));
    }
    parts.push(CTA(topic));
    return success(this.script(topic, parts.join(' '), durationSeconds));
  }

  async improve(script: Script, feedback: string[], _ctx: CallContext): Promise<ProviderResult<Script>> {
    let content = script.content.trim();
    const firstTerminator = content.match(/[.!?]/)?.[0];
    if (feedback.length > 0 && firstTerminator !== '?') {
      content = `Did you know this? ${content}`;
    }
    if (!CTA_PATTERN.test(content)) {
      content = `${content} Follow for more!`;
    }
    return success({ ...script, content, generator: `${script.generator}+simple-improve` });
  }

  private script(topic: string, content: string, durationSeconds: number): Script {
    const maxTitle = this.config.content.max_title_length;
    const title = `${topic.charAt(0).toUpperCase()}${topic.slice(1)}: quick facts`.slice(0, maxTitle);
    const topicTag = `#${topic.toLowerCase().replace(/[^a-z0-9]+/g, '')}`;
    const hashtags = [...this.config.content.default_hashtags];
    if (topicTag.length > 1 && !hashtags.includes(topicTag)) hashtags.push(topicTag);
    return { title, content, durationSeconds, hashtags, generator: this.id };
  }
}
