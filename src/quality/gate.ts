import type { Script } from '../providers/types.js';
import type { QualityConfig } from '../workspace/types.js';
import type { QualityTier } from '../state/types.js';
import { escapeRegExp, fleschReadingEase, splitSentences, tokenizeWords } from './text.js';

export type QualityDecision = 'auto-approve' | 'auto-improve' | 'reject';

export interface SubScores {
  readability: number;
  engagement: number;
  structure: number;
  accuracy: number;
  production?: number;
}

export interface QualityCheck {
  name: string;
  passed: boolean;
  message: string;
}

export interface VideoArtifact {
  path: string;
  sizeBytes: number;
  durationSeconds?: number;
}

export interface QualityInput {
  script: Script;
  video?: VideoArtifact;
}

export interface ScoreBreakdown {
  score: number;
  subScores: SubScores;
  checks: QualityCheck[];
  blacklistHits: string[];
}

export interface QualityReport extends ScoreBreakdown {
  decision: QualityDecision;
  tier: QualityTier;
  threshold: number;
  floor: number;
}

export interface ScriptScorer {
  score(input: QualityInput): ScoreBreakdown;
}

/** Spoken words per second assumed when checking script length against duration. */
export const WORDS_PER_SECOND = 2.5;
/** Longest video YouTube treats as a Short. */
export const MAX_SHORT_SECONDS = 60;

const HOOK_PATTERN = /\b(did you know|here's|here is|the truth|what if|imagine|secret|surprising|stop)\b/i;
const CTA_PATTERN = /\b(subscribe|follow|like|comment|share)\b/i;
const SECOND_PERSON = /\byou(r|rs)?\b/i;
const ABSOLUTE_CLAIM = /\b(always|never|guaranteed|proven|everyone|100%)(?=\W|$)/gi;

const round1 = (n: number) => Math.round(n * 10) / 10;
const clamp = (n: number) => Math.min(100, Math.max(0, n));

/**
 * Text heuristics for short-form scripts. The accuracy sub-score only
 * penalises unqualified absolute claims; there is no fact checking.
 */
export class HeuristicScorer implements ScriptScorer {
  constructor(private readonly config: QualityConfig) {}

  score(input: QualityInput): ScoreBreakdown {
    const { script, video } = input;
    const content = script.content;
    const words = tokenizeWords(content);
    const sentences = splitSentences(content);
    const firstSentence = sentences[0] ?? '';
    const firstTerminator = content.match(/[.!?]/)?.[0];

    const targetWords = script.durationSeconds * WORDS_PER_SECOND;
    const lengthOk = words.length >= targetWords * 0.5 && words.length <= targetWords * 1.5;
    const hasHook =
      tokenizeWords(firstSentence).length <= 15 &&
      (firstTerminator === '?' || HOOK_PATTERN.test(firstSentence) || /\d/.test(firstSentence));
    const hasCta = CTA_PATTERN.test(content);
    const asksQuestion = content.includes('?');
    const addressesViewer = SECOND_PERSON.test(content);
    const hasNumbers = /\d/.test(content);
    const absoluteClaims = content.match(ABSOLUTE_CLAIM) ?? [];

    const checks: QualityCheck[] = [
      {
        name: 'hook',
        passed: hasHook,
        message: 'Open with a short hook: a question, a number or a surprising claim',
      },
      {
        name: 'call_to_action',
        passed: hasCta,
        message: 'End with a call to action (follow, subscribe, comment or share)',
      },
      {
        name: 'length',
        passed: lengthOk,
        message: `Aim for about ${Math.round(targetWords)} words for ${script.durationSeconds}s of narration`,
      },
      {
        name: 'viewer_address',
        passed: addressesViewer,
        message: 'Speak to the viewer directly ("you")',
      },
      {
        name: 'absolute_claims',
        passed: absoluteClaims.length === 0,
        message: 'Qualify absolute claims such as "always" or "guaranteed"',
      },
    ];

    const engagement =
      40 + (asksQuestion ? 15 : 0) + (addressesViewer ? 15 : 0) + (hasNumbers ? 15 : 0) + (lengthOk ? 15 : 0);

    const subScores: SubScores = {
      readability: round1(clamp(fleschReadingEase(content))),
      engagement,
      structure: (hasHook ? 50 : 0) + (hasCta ? 50 : 0),
      accuracy: clamp(100 - 20 * absoluteClaims.length),
    };

    if (video) {
      const playable = video.sizeBytes > 0;
      const shortLength =
        video.durationSeconds !== undefined && video.durationSeconds <= MAX_SHORT_SECONDS;
      subScores.production = (playable ? 50 : 0) + (shortLength ? 50 : 0);
      checks.push({
        name: 'production',
        passed: playable && shortLength,
        message: `Rendered video must be non-empty and at most ${MAX_SHORT_SECONDS}s long`,
      });
    }

    return {
      score: this.composite(subScores),
      subScores,
      checks,
      blacklistHits: this.blacklistHits(`${script.title}\n${content}`),
    };
  }

  private composite(subScores: SubScores): number {
    const w = this.config.weights;
    const parts: Array<[number, number]> = [
      [w.readability, subScores.readability],
      [w.engagement, subScores.engagement],
      [w.structure, subScores.structure],
      [w.accuracy, subScores.accuracy],
    ];
    if (subScores.production !== undefined) parts.push([w.production, subScores.production]);
    const totalWeight = parts.reduce((sum, [weight]) => sum + weight, 0);
    if (totalWeight === 0) return 0;
    const weighted = parts.reduce((sum, [weight, value]) => sum + weight * value, 0);
    return round1(clamp(weighted / totalWeight));
  }

  private blacklistHits(text: string): string[] {
    return this.config.blacklist.filter((term) =>
      new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').test(text),
    );
  }
}

export class QualityGate {
  private readonly scorer: ScriptScorer;

  constructor(
    private readonly config: QualityConfig,
    scorer?: ScriptScorer,
  ) {
    this.scorer = scorer ?? new HeuristicScorer(config);
  }

  thresholdFor(tier: QualityTier): number {
    return tier === 'premium' ? this.config.premium_quality_score : this.config.min_quality_score;
  }

  evaluate(input: QualityInput, tier: QualityTier): QualityReport {
    const breakdown = this.scorer.score(input);
    const score = round1(clamp(breakdown.score));
    const threshold = this.thresholdFor(tier);
    const floor = Math.max(0, threshold - this.config.improve_band);
    return {
      ...breakdown,
      score,
      tier,
      threshold,
      floor,
      decision: this.decide(score, threshold, floor, breakdown.blacklistHits),
    };
  }

  decide(score: number, threshold: number, floor: number, blacklistHits: string[]): QualityDecision {
    if (blacklistHits.length > 0) return 'reject';
    if (score >= threshold) return 'auto-approve';
    if (score >= floor) return 'auto-improve';
    return 'reject';
  }
}

/** Improvement hints for a script provider, from the checks a report failed. */
export function feedbackFrom(report: QualityReport): string[] {
  return report.checks.filter((c) => !c.passed).map((c) => c.message);
}
