import { z } from 'zod';
import {
  booleanVar,
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

const DEFAULT_REDIS_URL = 'redis://127.0.0.1:6379';

export type CollectorConfig = {
  site: string;
  intervalSeconds: number;
  pbsBinDir: string;
  commandTimeoutMs: number;
  /** Publication targets; the first one is the primary. */
  redisUrls: string[];
  logLevel: LogLevel;
  appPath: string;
  status: {
    enabled: boolean;
    host: string;
    port: number;
  };
};

const collectorEnvSchema = z
  .object({
    PBS_PULSE_SITE: stringVar({ required: true, pattern: /^[A-Za-z0-9_-]+$/ }),
    PBS_PULSE_INTERVAL_SECONDS: integerVar({ defaultValue: 30, min: 1 }),
    PBS_PULSE_PBS_BIN_DIR: stringVar({ defaultValue: '/opt/pbs/bin' }),
    PBS_PULSE_COMMAND_TIMEOUT_MS: integerVar({ defaultValue: 60_000, min: 1_000 }),
    PBS_PULSE_REDIS_URLS: stringListVar({ defaultValue: [DEFAULT_REDIS_URL], unique: true }),
    PBS_PULSE_LOG_LEVEL: logLevelVar({ defaultValue: 'info' }),
    PBS_PULSE_APP_PATH: stringVar({ defaultValue: '/etc/app.d' }),
    PBS_PULSE_STATUS_ENABLED: booleanVar({ defaultValue: true }),
    PBS_PULSE_STATUS_HOST: hostVar({ defaultHost: '127.0.0.1' }),
    PBS_PULSE_STATUS_PORT: portVar({ defaultPort: 4410 })
  })
  .transform(
    (env): CollectorConfig => ({
      site: env.PBS_PULSE_SITE ?? '',
      intervalSeconds: env.PBS_PULSE_INTERVAL_SECONDS ?? 30,
      pbsBinDir: env.PBS_PULSE_PBS_BIN_DIR ?? '/opt/pbs/bin',
      commandTimeoutMs: env.PBS_PULSE_COMMAND_TIMEOUT_MS ?? 60_000,
      redisUrls: env.PBS_PULSE_REDIS_URLS.length > 0 ? env.PBS_PULSE_REDIS_URLS : [DEFAULT_REDIS_URL],
      logLevel: env.PBS_PULSE_LOG_LEVEL,
      appPath: env.PBS_PULSE_APP_PATH ?? '/etc/app.d',
      status: {
        enabled: env.PBS_PULSE_STATUS_ENABLED ?? true,
        host: env.PBS_PULSE_STATUS_HOST ?? '127.0.0.1',
        port: env.PBS_PULSE_STATUS_PORT ?? 4410
      }
    })
  );

export function loadCollectorConfig(env: EnvSource = process.env): CollectorConfig {
  return loadEnvConfig(collectorEnvSchema, { env, context: 'pbs-collector' });
}
