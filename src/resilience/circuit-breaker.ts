import { logger } from '../shared/logger.js';
import type { CircuitBreakerConfig } from '../workspace/types.js';

export type CircuitStatus = 'closed' | 'open' | 'half_open';

export interface CircuitState {
  status: CircuitStatus;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  nextAttemptAt: number | null;
  cooldownMs: number;
  probeInFlight: boolean;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  maxCooldownMs: number;
  now?: () => number;
}

const log = logger.child({ component: 'circuit-breaker' });

/**
 * Per-provider circuit breaker.
 *
 * closed -> open after `failureThreshold` consecutive failures; open rejects
 * until the cool-down elapses, then admits exactly one half-open probe. A
 * successful probe closes the circuit and resets the cool-down; a failed one
 * re-opens it with the cool-down doubled (capped at `maxCooldownMs`).
 *
 * Every method is synchronous, so two callers racing for the half-open probe
 * are serialised by the event loop and only one is admitted.
 */
export class CircuitBreaker {
  private readonly circuits = new Map<string, CircuitState>();
  private readonly now: () => number;

  constructor(private readonly opts: CircuitBreakerOptions) {
    this.now = opts.now ?? Date.now;
  }

  static fromConfig(config: CircuitBreakerConfig, now?: () => number): CircuitBreaker {
    return new CircuitBreaker({
      failureThreshold: config.failure_threshold,
      cooldownMs: config.cooldown_seconds * 1000,
      maxCooldownMs: config.max_cooldown_seconds * 1000,
      now,
    });
  }

  allow(providerId: string): boolean {
    const circuit = this.circuit(providerId);
    switch (circuit.status) {
      case 'closed':
        return true;
      case 'open': {
        if (circuit.nextAttemptAt !== null && this.now() >= circuit.nextAttemptAt) {
          this.transition(providerId, circuit, 'half_open');
          circuit.probeInFlight = true;
          return true;
        }
        return false;
      }
      case 'half_open': {
        if (circuit.probeInFlight) return false;
        circuit.probeInFlight = true;
        return true;
      }
    }
  }

  recordSuccess(providerId: string): void {
    const circuit = this.circuit(providerId);
    circuit.consecutiveFailures = 0;
    circuit.probeInFlight = false;
    log.debug('Provider call succeeded', { provider: providerId, at: this.isoNow() });
    if (circuit.status !== 'closed') {
      circuit.cooldownMs = this.opts.cooldownMs;
      circuit.nextAttemptAt = null;
      this.transition(providerId, circuit, 'closed');
    }
  }

  recordFailure(providerId: string): void {
    const circuit = this.circuit(providerId);
    const now = this.now();
    circuit.consecutiveFailures += 1;
    circuit.lastFailureAt = now;
    log.warn('Provider call failed', {
      provider: providerId,
      consecutiveFailures: circuit.consecutiveFailures,
      at: this.isoNow(),
    });

    if (circuit.status === 'half_open') {
      circuit.probeInFlight = false;
      circuit.cooldownMs = Math.min(circuit.cooldownMs * 2, this.opts.maxCooldownMs);
      circuit.nextAttemptAt = now + circuit.cooldownMs;
      this.transition(providerId, circuit, 'open');
    } else if (circuit.status === 'closed' && circuit.consecutiveFailures >= this.opts.failureThreshold) {
      circuit.nextAttemptAt = now + circuit.cooldownMs;
      this.transition(providerId, circuit, 'open');
    }
  }

  /**
   * Give back a half-open probe slot whose call ended without an outcome
   * (the caller was cancelled before the provider answered).
   */
  releaseProbe(providerId: string): void {
    const circuit = this.circuits.get(providerId);
    if (circuit?.status === 'half_open') circuit.probeInFlight = false;
  }

  state(providerId: string): CircuitState {
    return { ...this.circuit(providerId) };
  }

  snapshot(): Record<string, CircuitState> {
    const out: Record<string, CircuitState> = {};
    for (const [id, circuit] of this.circuits) {
      out[id] = { ...circuit };
    }
    return out;
  }

  private circuit(providerId: string): CircuitState {
    let circuit = this.circuits.get(providerId);
    if (!circuit) {
      circuit = {
        status: 'closed',
        consecutiveFailures: 0,
        lastFailureAt: null,
        nextAttemptAt: null,
        cooldownMs: this.opts.cooldownMs,
        probeInFlight: false,
      };
      this.circuits.set(providerId, circuit);
    }
    return circuit;
  }

  private transition(providerId: string, circuit: CircuitState, to: CircuitStatus): void {
    const from = circuit.status;
    circuit.status = to;
    log.info('Circuit state changed', {
      provider: providerId,
      from,
      to,
      cooldownMs: circuit.cooldownMs,
      at: this.isoNow(),
    });
  }

  private isoNow(): string {
    return new Date(this.now()).toISOString();
  }
}
