import { describe, it, expect } from 'vitest';
import { configSchema } from '../validation.js';

const emptySections = {
  server: {},
  input: {},
  output: {},
  pypi: {},
  checkout: {},
  pipeline: {},
  scan: {},
};

describe('configSchema', () => {
  it('fills in defaults for every setting', () => {
    expect(configSchema.parse(emptySections)).toEqual({
      server: { nodeEnv: 'development', logLevel: 'info' },
      input: { packageListPath: 'top-pypi-packages/top-pypi-packages-30-days.json' },
      output: { resultsPath: 'results.json' },
      pypi: { baseUrl: 'https://pypi.org', requestTimeoutMs: 60000 },
      checkout: { timeoutMs: 300000 },
      pipeline: { maxConcurrent: 100 },
      scan: { sourceSuffix: '.py' },
    });
  });

  it('accepts zero to disable timeouts', () => {
    const parsed = configSchema.parse({
      ...emptySections,
      pypi: { requestTimeoutMs: 0 },
      checkout: { timeoutMs: 0 },
    });
    expect(parsed.pypi.requestTimeoutMs).toBe(0);
    expect(parsed.checkout.timeoutMs).toBe(0);
  });

  it('rejects a concurrency limit below one', () => {
    const parsed = configSchema.safeParse({ ...emptySections, pipeline: { maxConcurrent: 0 } });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.path).toEqual(['pipeline', 'maxConcurrent']);
  });

  it('rejects an unknown log level', () => {
    const parsed = configSchema.safeParse({ ...emptySections, server: { logLevel: 'verbose' } });
    expect(parsed.success).toBe(false);
  });

  it('rejects a negative timeout and a base URL that is not a URL', () => {
    expect(configSchema.safeParse({ ...emptySections, checkout: { timeoutMs: -1 } }).success).toBe(false);
    expect(configSchema.safeParse({ ...emptySections, pypi: { baseUrl: 'not a url' } }).success).toBe(false);
  });
});
