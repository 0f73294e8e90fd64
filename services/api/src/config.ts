import { z } from 'zod';
import {
  hostVar,
  integerVar,
  loadEnvConfig,
  logLevelVar,
  portVar,
  stringListVar,
  stringVar,
  type EnvSource,
  type LogLevel
} from '@hpcpulse/shared';
import { DEFAULT_MAX_AGE_SECONDS } from '@hpcpulse/pbs-model';

export interface ApiConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  /** Document store to read from; `inline` selects the in-process store. */
  redisUrl: string;
  sites: string[];
  user: string;
  password: string;
  maxAgeSeconds: number;
}

const apiEnvSchema = z
  .object({
    PBS_API_HOST: hostVar({ defaultHost: '0.0.0.0' }),
    PBS_API_PORT: portVar({ defaultPort: 4400 }),
    PBS_API_LOG_LEVEL: logLevelVar({ defaultValue: 'info' }),
    PBS_API_REDIS_URL: stringVar({ required: true }),
    PBS_API_SITES: stringListVar({ required: true, unique: true }),
    PBS_API_USER: stringVar({ required: true }),
    PBS_API_PASSWORD: stringVar({ required: true }),
    PBS_API_MAX_AGE_SECONDS: integerVar({ defaultValue: DEFAULT_MAX_AGE_SECONDS, min: 1 })
  })
  .transform(
    (env): ApiConfig => ({
      host: env.PBS_API_HOST ?? '0.0.0.0',
      port: env.PBS_API_PORT ?? 4400,
      logLevel: env.PBS_API_LOG_LEVEL,
      redisUrl: env.PBS_API_REDIS_URL ?? '',
      sites: env.PBS_API_SITES,
      user: env.PBS_API_USER ?? '',
      password: env.PBS_API_PASSWORD ?? '',
      maxAgeSeconds: env.PBS_API_MAX_AGE_SECONDS ?? DEFAULT_MAX_AGE_SECONDS
    })
  );

export const loadConfig = (env: EnvSource = process.env): ApiConfig =>
  loadEnvConfig(apiEnvSchema, { env, context: 'pbs-api' });
