import { DEFAULT_SALT_ROUNDS } from '../types/constants';

export type DataStoreKind = 'memory' | 'supabase';

export interface SupabaseConfig {
  url: string;
  serviceRoleKey: string;
}

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  sessionSecret: string;
  dataStore: DataStoreKind;
  supabase: SupabaseConfig | null;
  redisUrl: string | null;
  frontendUrl: string | null;
  saltRounds: number;
  seedDemo: boolean;
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const DEV_SESSION_SECRET = 'dev-secret';

const parseInteger = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
};

/**
 * Build the application configuration from environment variables.
 * Supabase is used when DATA_STORE=supabase, or when DATA_STORE is unset
 * and both Supabase variables are present.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';

  const sessionSecret = env.SESSION_SECRET || (isProduction ? '' : DEV_SESSION_SECRET);
  if (!sessionSecret) {
    throw new ConfigError('SESSION_SECRET environment variable is required');
  }

  const supabase =
    env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
      ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  const requestedStore = env.DATA_STORE;
  let dataStore: DataStoreKind;
  switch (requestedStore) {
    case undefined:
    case '':
      dataStore = supabase ? 'supabase' : 'memory';
      break;
    case 'memory':
    case 'supabase':
      dataStore = requestedStore;
      break;
    default:
      throw new ConfigError(`DATA_STORE must be "memory" or "supabase", got "${requestedStore}"`);
  }

  if (dataStore === 'supabase' && !supabase) {
    throw new ConfigError(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when DATA_STORE=supabase'
    );
  }

  const saltRounds = parseInteger('BCRYPT_SALT_ROUNDS', env.BCRYPT_SALT_ROUNDS, DEFAULT_SALT_ROUNDS);
  // bcrypt rejects fewer than 4 rounds
  if (saltRounds < 4 || saltRounds > 31) {
    throw new ConfigError('BCRYPT_SALT_ROUNDS must be between 4 and 31');
  }

  return {
    nodeEnv,
    isProduction,
    port: parseInteger('PORT', env.PORT, 3001),
    sessionSecret,
    dataStore,
    supabase,
    redisUrl: env.REDIS_URL || null,
    frontendUrl: env.FRONTEND_URL || null,
    saltRounds,
    seedDemo: parseBoolean(env.SEED_DEMO, true),
    logLevel: env.LOG_LEVEL || 'info',
  };
};
