import { stableIndex } from '../../shared/ids.js';
import { success } from '../types.js';
import type { CallContext, ProviderResult, Trend, TrendProvider, TrendRequest } from '../types.js';

const NICHE_TOPICS: Record<string, string[]> = {
  science: ['black holes', 'the human microbiome', 'quantum tunnelling', 'why the sky is blue'],
  technology: ['how GPS works', 'open source software', 'solid state batteries', 'how compilers work'],
  history: ['the printing press', 'the silk road', 'ancient Roman concrete', 'the first computers'],
  nature: ['octopus intelligence', 'tardigrades', 'bird migration', 'bioluminescent plankton'],
  finance: ['compound interest', 'index funds', 'how inflation works', 'emergency funds'],
  health: ['sleep cycles', 'hydration myths', 'how vaccines train immunity', 'walking after meals'],
};

const GENERAL_TOPICS = ['everyday science', 'useful life skills', 'surprising world records', 'how things work'];

/**
 * Uses the requested topic when one is given; otherwise picks a topic for the
 * channel niche, stable for a given job.
 */
export class SimpleTrendProvider implements TrendProvider {
  readonly id = 'simple';

  async detect(request: TrendRequest, ctx: CallContext): Promise<ProviderResult<Trend>> {
    if (request.topic) {
      return success({ topic: request.topic, score: 1, source: 'manual' });
    }
    const pool = NICHE_TOPICS[request.niche.toLowerCase()] ?? GENERAL_TOPICS;
    const topic = pool[stableIndex(ctx.jobId, pool.length)] ?? GENERAL_TOPICS[0] ?? request.niche;
    return success({ topic, score: 0.5, source: 'simple' });
  }
}
