import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const parseNumber = (value: string | undefined, parser: (raw: string) => number): number | undefined =>
  value ? parser(value) : undefined;

function loadConfig(): Config {
  const rawConfig = {
    server: {
      nodeEnv: process.env.NODE_ENV,
      logLevel: process.env.LOG_LEVEL,
    },
    pipeline: {
      sourceDir: process.env.SOURCE_DIR || undefined,
      destDir: process.env.DEST_DIR || undefined,
      rulesPath: process.env.INGESTION_RULES_PATH || undefined,
      pathLimit: parseNumber(process.env.PATH_LENGTH_LIMIT, raw => parseInt(raw, 10)),
      parallelThreshold: parseNumber(process.env.PARALLEL_THRESHOLD, raw => parseInt(raw, 10)),
      workerFraction: parseNumber(process.env.WORKER_FRACTION, parseFloat),
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
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
