/**
 * Report Configuration
 *
 * Output paths, log level and the model-name command, read from the
 * environment and validated once.
 */

import { z } from 'zod';
import { DEFAULT_MODEL_COMMAND } from './hardware/index.js';
import type { OutputTarget } from './types/index.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  STRESS_CSV_PATH: z.string().min(1).default('stress-log.csv'),
  STRESS_SUMMARY_PATH: z.string().min(1).default('stress-summary.txt'),
  STRESS_MODEL_COMMAND: z.string().min(1).default(DEFAULT_MODEL_COMMAND),
});

export type ReportEnv = z.infer<typeof envSchema>;

export interface ReportConfig {
  env: ReportEnv['NODE_ENV'];
  logLevel: ReportEnv['LOG_LEVEL'];
  output: OutputTarget;
  modelCommand: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    output: {
      csvPath: parsed.STRESS_CSV_PATH,
      summaryPath: parsed.STRESS_SUMMARY_PATH,
    },
    modelCommand: parsed.STRESS_MODEL_COMMAND,
  };
}
