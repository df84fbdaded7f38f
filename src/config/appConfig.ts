export type AppEnvironment = 'local' | 'dev' | 'prod';

export interface SyncConfig {
  /** Delivery attempts per queued action before the flush gives up. */
  maxRetries: number;
  backoffMs: number;
}

export interface DemoConfig {
  tickMs: number;
  completeAfterMs: number;
}

export interface AppConfig {
  environment: AppEnvironment;
  debug: boolean;
  language: string;
  sync: SyncConfig;
  demo: DemoConfig;
}

export type EnvSource = Record<string, string | undefined>;

const ENVIRONMENTS: AppEnvironment[] = ['local', 'dev', 'prod'];

export const DEFAULT_APP_CONFIG: AppConfig = {
  environment: 'local',
  debug: false,
  language: 'EN',
  sync: { maxRetries: 5, backoffMs: 2000 },
  demo: { tickMs: 5000, completeAfterMs: 120000 }
};

const readEnv = (env: EnvSource, key: string): string => (env[key] || '').toString().trim();

const readInt = (env: EnvSource, key: string, fallback: number): number => {
  const raw = readEnv(env, key);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
};

const readBool = (env: EnvSource, key: string, fallback: boolean): boolean => {
  const raw = readEnv(env, key).toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
};

const isEnvironment = (value: string): value is AppEnvironment =>
  ENVIRONMENTS.some(candidate => candidate === value);

export const validateAppConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];
  if (!isEnvironment(config.environment)) {
    errors.push(`Unsupported environment "${config.environment}". Use one of: ${ENVIRONMENTS.join(', ')}.`);
  }
  if (config.sync.maxRetries < 0) errors.push('SYNC_MAX_RETRIES must be >= 0.');
  if (config.sync.backoffMs < 0) errors.push('SYNC_BACKOFF_MS must be >= 0.');
  if (config.demo.tickMs <= 0) errors.push('DEMO_TICK_MS must be > 0.');
  if (config.demo.completeAfterMs < 0) errors.push('DEMO_COMPLETE_AFTER_MS must be >= 0.');
  return errors;
};

/**
 * Reads configuration from environment variables, falling back to defaults for
 * anything unset or unparsable. Invalid combinations are reported, not thrown.
 */
export const loadAppConfig = (env: EnvSource = process.env): { config: AppConfig; errors: string[] } => {
  const rawEnvironment = readEnv(env, 'FIELD_ROUTE_ENV').toLowerCase() || DEFAULT_APP_CONFIG.environment;
  const errors: string[] = [];
  let environment: AppEnvironment = DEFAULT_APP_CONFIG.environment;
  if (isEnvironment(rawEnvironment)) {
    environment = rawEnvironment;
  } else {
    errors.push(`Unsupported environment "${rawEnvironment}". Use one of: ${ENVIRONMENTS.join(', ')}.`);
  }

  const config: AppConfig = {
    environment,
    debug: readBool(env, 'FIELD_ROUTE_DEBUG', DEFAULT_APP_CONFIG.debug),
    language: (readEnv(env, 'FIELD_ROUTE_LANGUAGE') || DEFAULT_APP_CONFIG.language).toUpperCase(),
    sync: {
      maxRetries: readInt(env, 'SYNC_MAX_RETRIES', DEFAULT_APP_CONFIG.sync.maxRetries),
      backoffMs: readInt(env, 'SYNC_BACKOFF_MS', DEFAULT_APP_CONFIG.sync.backoffMs)
    },
    demo: {
      tickMs: readInt(env, 'DEMO_TICK_MS', DEFAULT_APP_CONFIG.demo.tickMs),
      completeAfterMs: readInt(env, 'DEMO_COMPLETE_AFTER_MS', DEFAULT_APP_CONFIG.demo.completeAfterMs)
    }
  };

  errors.push(...validateAppConfig(config));
  return { config, errors };
};
