import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { withTimeout } from '../shared/async.js';
import { TimeoutError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { registerBuiltinProviders } from './builtins.js';
import { lookupProvider, registeredProviders } from './registry.js';
import type { ProviderDeps } from './registry.js';
import { retryable } from './types.js';
import type { CallContext, Capability, CapabilityMap, ProviderResult } from './types.js';

/**
 * Last-resort provider appended to every capability's candidate list. Upload
 * has none: falling back from a real platform to a local copy would report a
 * publish that never happened.
 */
const FALLBACK_PROVIDER: Record<Capability, string | null> = {
  trend: 'simple',
  script: 'simple',
  asset: 'simple',
  voiceover: 'simple',
  video: 'simple',
  thumbnail: 'simple',
  upload: null,
};

export type CandidateMap = { [C in Capability]: Array<CapabilityMap[C]> };

export interface InvocationAttempt {
  providerId: string;
  outcome: 'success' | 'retryable' | 'fatal' | 'skipped';
  reason?: string;
  /** The call hit the per-call timeout rather than failing on its own. */
  timedOut?: boolean;
}

export interface Invocation<T> {
  result: ProviderResult<T>;
  /** Provider that produced `result`; null when every candidate was skipped or failed. */
  providerId: string | null;
  attempts: InvocationAttempt[];
  /** Every candidate that ran hit the per-call timeout. */
  timedOut: boolean;
}

const log = logger.child({ component: 'providers' });

export function qualifiedId(capability: Capability, providerId: string): string {
  return `${capability}.${providerId}`;
}

/** Configured names for a capability, with the fallback appended once. */
export function candidateNames(deps: ProviderDeps, capability: Capability): string[] {
  const names = [...deps.config.providers[capability]];
  const fallback = FALLBACK_PROVIDER[capability];
  if (fallback) names.push(fallback);
  return [...new Set(names)];
}

function exhaustedReason(attempts: InvocationAttempt[], ran: InvocationAttempt[]): string {
  const last = ran[ran.length - 1];
  if (last) return `no provider available (${last.providerId}: ${last.reason ?? 'failed'})`;
  if (attempts.length > 0) return 'no provider available (all circuits open)';
  return 'no provider available';
}

export class ProviderFactory {
  constructor(
    private readonly candidates: CandidateMap,
    private readonly breaker: CircuitBreaker,
    private readonly callTimeoutMs: number,
  ) {}

  /**
   * Resolve configured provider names to instances once. Unknown names are an
   * error; known providers that cannot be built (missing API key) are skipped.
   */
  static build(deps: ProviderDeps, breaker: CircuitBreaker): ProviderFactory {
    registerBuiltinProviders();

    const resolve = <C extends Capability>(capability: C): Array<CapabilityMap[C]> => {
      const out: Array<CapabilityMap[C]> = [];
      for (const name of candidateNames(deps, capability)) {
        const create = lookupProvider(capability, name);
        if (!create) {
          throw new Error(
            `Unknown ${capability} provider "${name}" in config (known: ${registeredProviders(capability).join(', ')})`,
          );
        }
        const provider = create(deps);
        if (provider) {
          out.push(provider);
        } else {
          log.warn('Provider not configured, skipping', { provider: qualifiedId(capability, name) });
        }
      }
      return out;
    };

    return new ProviderFactory(
      {
        trend: resolve('trend'),
        script: resolve('script'),
        asset: resolve('asset'),
        voiceover: resolve('voiceover'),
        video: resolve('video'),
        thumbnail: resolve('thumbnail'),
        upload: resolve('upload'),
      },
      breaker,
      deps.config.pipeline.stage_timeout_seconds * 1000,
    );
  }

  candidateIds(capability: Capability): string[] {
    const list: Array<CapabilityMap[Capability]> = this.candidates[capability];
    return list.map((p) => qualifiedId(capability, p.id));
  }

  describe(): Record<Capability, string[]> {
    return {
      trend: this.candidateIds('trend'),
      script: this.candidateIds('script'),
      asset: this.candidateIds('asset'),
      voiceover: this.candidateIds('voiceover'),
      video: this.candidateIds('video'),
      thumbnail: this.candidateIds('thumbnail'),
      upload: this.candidateIds('upload'),
    };
  }

  /**
   * Call `call` on each candidate in order until one succeeds. Open circuits
   * are skipped; retryable results, thrown errors and per-call timeouts move
   * on to the next candidate; a fatal result stops the search. Aborts of the
   * caller's own signal propagate.
   */
  async invoke<C extends Capability, T>(
    capability: C,
    call: (provider: CapabilityMap[C], ctx: CallContext) => Promise<ProviderResult<T>>,
    ctx: CallContext,
  ): Promise<Invocation<T>> {
    const attempts: InvocationAttempt[] = [];
    const list: Array<CapabilityMap[C]> = this.candidates[capability];

    for (const provider of list) {
      const providerId = qualifiedId(capability, provider.id);
      if (!this.breaker.allow(providerId)) {
        attempts.push({ providerId, outcome: 'skipped', reason: 'circuit open' });
        continue;
      }

      let result: ProviderResult<T>;
      let timedOut = false;
      try {
        result = await withTimeout(
          (signal) => call(provider, { ...ctx, signal }),
          this.callTimeoutMs,
          ctx.signal,
          providerId,
        );
      } catch (err) {
        if (ctx.signal.aborted) {
          this.breaker.releaseProbe(providerId);
          throw err;
        }
        timedOut = err instanceof TimeoutError;
        result = retryable(timedOut ? errorMessage(err) : `${providerId} threw: ${errorMessage(err)}`);
      }

      if (result.kind === 'success') {
        this.breaker.recordSuccess(providerId);
        attempts.push({ providerId, outcome: 'success' });
        return { result, providerId, attempts, timedOut: false };
      }

      this.breaker.recordFailure(providerId);
      attempts.push({ providerId, outcome: result.kind, reason: result.reason, ...(timedOut ? { timedOut } : {}) });
      log.warn('Provider call failed', { job: ctx.jobId, provider: providerId, outcome: result.kind, reason: result.reason });
      if (result.kind === 'fatal') {
        return { result, providerId, attempts, timedOut: false };
      }
    }

    const ran = attempts.filter((a) => a.outcome !== 'skipped');
    return {
      result: retryable(exhaustedReason(attempts, ran)),
      providerId: null,
      attempts,
      timedOut: ran.length > 0 && ran.every((a) => a.timedOut === true),
    };
  }
}
