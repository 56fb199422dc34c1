import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const toInt = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

function loadConfig(): Config {
  const rawConfig = {
    server: {
      nodeEnv: nonEmpty(process.env.NODE_ENV),
      logLevel: nonEmpty(process.env.LOG_LEVEL),
    },
    input: {
      packageListPath: nonEmpty(process.env.PACKAGE_LIST_PATH),
    },
    output: {
      resultsPath: nonEmpty(process.env.RESULTS_PATH),
    },
    pypi: {
      baseUrl: nonEmpty(process.env.PYPI_BASE_URL),
      requestTimeoutMs: toInt(process.env.HTTP_TIMEOUT_MS),
    },
    checkout: {
      timeoutMs: toInt(process.env.CHECKOUT_TIMEOUT_MS),
    },
    pipeline: {
      maxConcurrent: toInt(process.env.MAX_CONCURRENT),
    },
    scan: {
      sourceSuffix: nonEmpty(process.env.SOURCE_SUFFIX),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck your environment (or .env file) against .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
