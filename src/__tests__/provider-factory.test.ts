import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProviderFactory, candidateNames } from '../providers/factory.js';
import type { CandidateMap } from '../providers/factory.js';
import { registerProvider, lookupProvider } from '../providers/registry.js';
import type { ProviderDeps } from '../providers/registry.js';
import { fatal, retryable, success } from '../providers/types.js';
import type { CallContext, ProviderResult, Script, ScriptProvider } from '../providers/types.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { CancelledError } from '../shared/errors.js';
import { defaultStudioConfig, parseStudioConfig } from '../workspace/config.js';
import { getStudioPaths } from '../workspace/paths.js';

const SCRIPT: Script = {
  title: 'Tardigrades',
  content: 'Did you know tardigrades survive space? Follow for more!',
  durationSeconds: 45,
  hashtags: ['#shorts'],
  generator: 'fake',
};

class FakeScriptProvider implements ScriptProvider {
  calls = 0;
  constructor(
    readonly id: string,
    private readonly behaviour: (call: number, ctx: CallContext) => Promise<ProviderResult<Script>>,
  ) {}
  generate(_topic: string, _duration: number, ctx: CallContext): Promise<ProviderResult<Script>> {
    this.calls += 1;
    return this.behaviour(this.calls, ctx);
  }
  improve(script: Script): Promise<ProviderResult<Script>> {
    return Promise.resolve(success(script));
  }
}

function candidates(script: ScriptProvider[]): CandidateMap {
  return { trend: [], script, asset: [], voiceover: [], video: [], thumbnail: [], upload: [] };
}

function ctx(signal: AbortSignal = new AbortController().signal): CallContext {
  return { signal, jobId: 'job_test', workDir: tmpdir() };
}

const generate = (p: ScriptProvider, c: CallContext) => p.generate('tardigrades', 45, c);

describe('ProviderFactory.invoke', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker({ failureThreshold: 5, cooldownMs: 60_000, maxCooldownMs: 900_000 });
  });

  it('falls back to the next candidate on a retryable result', async () => {
    const primary = new FakeScriptProvider('cohere', async () => retryable('cohere responded 503'));
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([primary, fallback]), breaker, 1000);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.result).toEqual({ kind: 'success', value: SCRIPT });
    expect(out.providerId).toBe('script.simple');
    expect(out.attempts).toEqual([
      { providerId: 'script.cohere', outcome: 'retryable', reason: 'cohere responded 503' },
      { providerId: 'script.simple', outcome: 'success' },
    ]);
    expect(breaker.state('script.cohere').consecutiveFailures).toBe(1);
  });

  it('stops at a fatal result without trying later candidates', async () => {
    const primary = new FakeScriptProvider('cohere', async () => fatal('cohere responded 401'));
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([primary, fallback]), breaker, 1000);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.result).toEqual({ kind: 'fatal', reason: 'cohere responded 401' });
    expect(out.providerId).toBe('script.cohere');
    expect(fallback.calls).toBe(0);
  });

  it('treats a thrown error as retryable', async () => {
    const primary = new FakeScriptProvider('cohere', async () => {
      throw new Error('socket hang up');
    });
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([primary, fallback]), breaker, 1000);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.providerId).toBe('script.simple');
    expect(out.attempts[0]).toEqual({
      providerId: 'script.cohere',
      outcome: 'retryable',
      reason: 'script.cohere threw: socket hang up',
    });
  });

  it('times out a hanging provider and moves on', async () => {
    const hanging = new FakeScriptProvider('cohere', () => new Promise<ProviderResult<Script>>(() => undefined));
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([hanging, fallback]), breaker, 20);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.providerId).toBe('script.simple');
    expect(out.attempts[0]).toEqual({
      providerId: 'script.cohere',
      outcome: 'retryable',
      reason: 'script.cohere timed out after 20ms',
      timedOut: true,
    });
    expect(out.timedOut).toBe(false);
  });

  it('skips providers whose circuit is open', async () => {
    const tripping = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 60_000, maxCooldownMs: 900_000 });
    const primary = new FakeScriptProvider('cohere', async () => retryable('down'));
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([primary, fallback]), tripping, 1000);

    await factory.invoke('script', generate, ctx());
    const second = await factory.invoke('script', generate, ctx());

    expect(primary.calls).toBe(1);
    expect(second.attempts[0]).toEqual({ providerId: 'script.cohere', outcome: 'skipped', reason: 'circuit open' });
    expect(second.providerId).toBe('script.simple');
  });

  it('reports no provider available when every candidate fails', async () => {
    const a = new FakeScriptProvider('cohere', async () => retryable('down'));
    const b = new FakeScriptProvider('simple', async () => retryable('also down'));
    const factory = new ProviderFactory(candidates([a, b]), breaker, 1000);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.result).toEqual({ kind: 'retryable', reason: 'no provider available (script.simple: also down)' });
    expect(out.providerId).toBeNull();
    expect(out.attempts).toHaveLength(2);
    expect(out.timedOut).toBe(false);
  });

  it('flags the invocation as timed out when every candidate that ran timed out', async () => {
    const tripping = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 60_000, maxCooldownMs: 900_000 });
    tripping.recordFailure('script.cohere');
    const skipped = new FakeScriptProvider('cohere', async () => success(SCRIPT));
    const hanging = new FakeScriptProvider('simple', () => new Promise<ProviderResult<Script>>(() => undefined));
    const factory = new ProviderFactory(candidates([skipped, hanging]), tripping, 20);

    const out = await factory.invoke('script', generate, ctx());

    expect(skipped.calls).toBe(0);
    expect(out.timedOut).toBe(true);
    expect(out.result).toEqual({
      kind: 'retryable',
      reason: 'no provider available (script.simple: script.simple timed out after 20ms)',
    });
  });

  it('says when every candidate was skipped by an open circuit', async () => {
    const tripping = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 60_000, maxCooldownMs: 900_000 });
    tripping.recordFailure('script.cohere');
    const primary = new FakeScriptProvider('cohere', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([primary]), tripping, 1000);

    const out = await factory.invoke('script', generate, ctx());

    expect(out.result).toEqual({ kind: 'retryable', reason: 'no provider available (all circuits open)' });
    expect(out.timedOut).toBe(false);
  });

  it('propagates the caller abort instead of falling back', async () => {
    const controller = new AbortController();
    const slow = new FakeScriptProvider('cohere', () => new Promise<ProviderResult<Script>>(() => undefined));
    const fallback = new FakeScriptProvider('simple', async () => success(SCRIPT));
    const factory = new ProviderFactory(candidates([slow, fallback]), breaker, 10_000);

    const pending = factory.invoke('script', generate, ctx(controller.signal));
    controller.abort(new CancelledError('job cancelled'));

    await expect(pending).rejects.toThrow('job cancelled');
    expect(fallback.calls).toBe(0);
    expect(breaker.state('script.cohere').consecutiveFailures).toBe(0);
  });

  it('hands the provider a signal that aborts on timeout', async () => {
    let seen: AbortSignal | undefined;
    const hanging = new FakeScriptProvider('cohere', (_n, c) => {
      seen = c.signal;
      return new Promise<ProviderResult<Script>>(() => undefined);
    });
    const factory = new ProviderFactory(candidates([hanging]), breaker, 10);

    await factory.invoke('script', generate, ctx());

    expect(seen?.aborted).toBe(true);
  });
});

describe('ProviderFactory.build', () => {
  let dir: string;
  let deps: ProviderDeps;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shortsmith-factory-'));
    deps = {
      config: defaultStudioConfig(),
      credentials: {},
      paths: getStudioPaths(dir),
      fetch: async () => new Response('{}'),
    };
  });

  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  it('appends the simple fallback once, after the configured providers', () => {
    expect(candidateNames(deps, 'script')).toEqual(['cohere', 'simple']);
    const config = parseStudioConfig({ providers: { script: ['simple', 'cohere'] } });
    expect(candidateNames({ ...deps, config }, 'script')).toEqual(['simple', 'cohere']);
  });

  it('never appends a fallback uploader', () => {
    expect(candidateNames(deps, 'upload')).toEqual(['local']);
  });

  it('skips remote providers without credentials', () => {
    const factory = ProviderFactory.build(deps, new CircuitBreaker({ failureThreshold: 5, cooldownMs: 1, maxCooldownMs: 1 }));
    expect(factory.describe()).toEqual({
      trend: ['trend.simple'],
      script: ['script.simple'],
      asset: ['asset.simple'],
      voiceover: ['voiceover.simple'],
      video: ['video.simple'],
      thumbnail: ['thumbnail.simple'],
      upload: ['upload.local'],
    });
  });

  it('includes remote providers when their keys are present', () => {
    const factory = ProviderFactory.build(
      { ...deps, credentials: { cohereApiKey: 'test-secret', pexelsApiKey: 'test-secret' } },
      new CircuitBreaker({ failureThreshold: 5, cooldownMs: 1, maxCooldownMs: 1 }),
    );
    expect(factory.candidateIds('script')).toEqual(['script.cohere', 'script.simple']);
    expect(factory.candidateIds('asset')).toEqual(['asset.pexels', 'asset.simple']);
  });

  it('rejects unknown provider names', () => {
    const config = parseStudioConfig({ providers: { voiceover: ['nonexistent'] } });
    expect(() =>
      ProviderFactory.build({ ...deps, config }, new CircuitBreaker({ failureThreshold: 5, cooldownMs: 1, maxCooldownMs: 1 })),
    ).toThrow('Unknown voiceover provider "nonexistent" in config');
  });

  it('resolves providers registered after load without touching dispatch code', async () => {
    registerProvider('trend', 'fixed-test', () => ({
      id: 'fixed-test',
      detect: async () => success({ topic: 'registered topic', score: 0.9, source: 'fixed' }),
    }));
    expect(lookupProvider('trend', 'fixed-test')).toBeDefined();
    const config = parseStudioConfig({ providers: { trend: ['fixed-test'] } });
    const factory = ProviderFactory.build(
      { ...deps, config },
      new CircuitBreaker({ failureThreshold: 5, cooldownMs: 1, maxCooldownMs: 1 }),
    );
    const out = await factory.invoke('trend', (p, c) => p.detect({ niche: 'science' }, c), ctx());
    expect(out.result).toEqual({ kind: 'success', value: { topic: 'registered topic', score: 0.9, source: 'fixed' } });
  });
});
