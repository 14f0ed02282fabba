import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { logger, setLogLevel } from '../shared/logger.js';

describe('logger', () => {
  beforeEach(() => {
    setLogLevel('error');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes errors as JSON lines with child bindings and redacted fields', () => {
    const lines: string[] = [];
    jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });

    logger
      .child({ component: 'factory' })
      .error('Provider failed', { provider: 'script.cohere', error: 'Authorization: Bearer test-secret', apiKey: 'test-secret' });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'error',
      msg: 'Provider failed',
      component: 'factory',
      provider: 'script.cohere',
      error: '[REDACTED]',
      apiKey: '[REDACTED]',
    });
    expect(lines[0]?.endsWith('\n')).toBe(true);
  });

  it('drops entries below the configured level', () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    logger.info('queued');
    expect(write).not.toHaveBeenCalled();
  });
});
