import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  input: z.object({
    packageListPath: z.string().min(1).default('top-pypi-packages/top-pypi-packages-30-days.json'),
  }),
  output: z.object({
    resultsPath: z.string().min(1).default('results.json'),
  }),
  pypi: z.object({
    baseUrl: z.string().url().default('https://pypi.org'),
    requestTimeoutMs: z.number().int().nonnegative().default(60000),
  }),
  checkout: z.object({
    timeoutMs: z.number().int().nonnegative().default(300000),
  }),
  pipeline: z.object({
    maxConcurrent: z.number().int().positive().default(100),
  }),
  scan: z.object({
    sourceSuffix: z.string().min(1).default('.py'),
  }),
});

export type Config = z.infer<typeof configSchema>;
