import { describe, it, expect, beforeEach } from '@jest/globals';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';

describe('CircuitBreaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 1_000_000;
    breaker = new CircuitBreaker({
      failureThreshold: 5,
      cooldownMs: 60_000,
      maxCooldownMs: 900_000,
      now: () => clock,
    });
  });

  function fail(times: number, id = 'script.cohere') {
    for (let i = 0; i < times; i++) breaker.recordFailure(id);
  }

  it('stays closed below the failure threshold', () => {
    fail(4);
    expect(breaker.state('script.cohere').status).toBe('closed');
    expect(breaker.allow('script.cohere')).toBe(true);
  });

  it('opens after consecutive failures and rejects during cool-down', () => {
    fail(5);
    const state = breaker.state('script.cohere');
    expect(state.status).toBe('open');
    expect(state.nextAttemptAt).toBe(1_060_000);
    clock += 59_999;
    expect(breaker.allow('script.cohere')).toBe(false);
  });

  it('a success resets the consecutive failure count', () => {
    fail(4);
    breaker.recordSuccess('script.cohere');
    fail(4);
    expect(breaker.state('script.cohere').status).toBe('closed');
  });

  it('admits exactly one half-open probe after the cool-down', () => {
    fail(5);
    clock += 60_000;
    expect(breaker.allow('script.cohere')).toBe(true);
    expect(breaker.state('script.cohere').status).toBe('half_open');
    expect(breaker.allow('script.cohere')).toBe(false);
    expect(breaker.allow('script.cohere')).toBe(false);
  });

  it('closes on a successful probe and restores the base cool-down', () => {
    fail(5);
    clock += 60_000;
    breaker.allow('script.cohere');
    breaker.recordFailure('script.cohere');
    clock += 120_000;
    breaker.allow('script.cohere');
    breaker.recordSuccess('script.cohere');
    const state = breaker.state('script.cohere');
    expect(state.status).toBe('closed');
    expect(state.cooldownMs).toBe(60_000);
    expect(state.consecutiveFailures).toBe(0);
  });

  it('re-opens on a failed probe with the cool-down doubled', () => {
    fail(5);
    clock += 60_000;
    breaker.allow('script.cohere');
    breaker.recordFailure('script.cohere');
    const state = breaker.state('script.cohere');
    expect(state.status).toBe('open');
    expect(state.cooldownMs).toBe(120_000);
    clock += 119_999;
    expect(breaker.allow('script.cohere')).toBe(false);
    clock += 1;
    expect(breaker.allow('script.cohere')).toBe(true);
  });

  it('caps the doubled cool-down at the maximum', () => {
    fail(5);
    // 60s -> 120 -> 240 -> 480 -> 900 (cap) -> 900
    for (let i = 0; i < 5; i++) {
      clock += breaker.state('script.cohere').cooldownMs;
      expect(breaker.allow('script.cohere')).toBe(true);
      breaker.recordFailure('script.cohere');
    }
    expect(breaker.state('script.cohere').cooldownMs).toBe(900_000);
  });

  it('frees the probe slot when a probe is abandoned', () => {
    fail(5);
    clock += 60_000;
    expect(breaker.allow('script.cohere')).toBe(true);
    breaker.releaseProbe('script.cohere');
    expect(breaker.allow('script.cohere')).toBe(true);
  });

  it('tracks providers independently', () => {
    fail(5, 'script.cohere');
    expect(breaker.allow('asset.pexels')).toBe(true);
    expect(Object.keys(breaker.snapshot()).sort()).toEqual(['asset.pexels', 'script.cohere']);
  });

  it('builds from config in seconds', () => {
    const fromConfig = CircuitBreaker.fromConfig(
      { failure_threshold: 2, cooldown_seconds: 10, max_cooldown_seconds: 30 },
      () => clock,
    );
    fromConfig.recordFailure('voiceover.elevenlabs');
    fromConfig.recordFailure('voiceover.elevenlabs');
    expect(fromConfig.state('voiceover.elevenlabs').nextAttemptAt).toBe(clock + 10_000);
  });
});
