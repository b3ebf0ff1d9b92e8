import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((val) => val === 'true' || val === '1');

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val : undefined));

const envSchema = z.object({
  APP_NAME: z.string().default('layered-user-api'),
  APP_ENV: z.enum(['development', 'test', 'production']).default('development'),
  APP_PORT: z.coerce.number().int().positive().default(8080),
  APP_DEBUG: booleanFlag,
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  DATABASE_URL: optionalString,
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().default('user_api'),
  DB_SSLMODE: z.enum(['disable', 'require', 'verify-full']).default('disable'),
  DB_TIMEZONE: z.string().default('UTC'),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10000),

  REDIS_HOST: optionalString,
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: optionalString,
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),

  JWT_SECRET: z.string({ required_error: 'JWT_SECRET is required' }).min(1, 'JWT_SECRET is required'),
  JWT_EXPIRE_HOURS: z.coerce.number().positive().default(24),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),

  // Comma-separated list, or * for any origin
  CORS_ORIGINS: z.string().default('*'),

  SEED_PASSWORD: z.string().min(1).default('password123'),
});

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  sslMode: 'disable' | 'require' | 'verify-full';
  timezone: string;
  statementTimeoutMs: number;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
}

export interface AppConfig {
  readonly app: {
    name: string;
    env: 'development' | 'test' | 'production';
    port: number;
    debug: boolean;
  };
  readonly log: {
    level: string;
  };
  readonly database: DatabaseConfig;
  /** Absent when REDIS_HOST is unset; the API then runs without a cache. */
  readonly redis?: RedisConfig;
  readonly jwt: {
    secret: string;
    expireHours: number;
  };
  readonly rateLimit: {
    windowMs: number;
    max: number;
    loginMax: number;
  };
  readonly cors: {
    /** `true` reflects any request origin. */
    origin: true | string[];
  };
  readonly seed: {
    password: string;
  };
}

function parseOrigins(raw: string): true | string[] {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length === 0 || origins.includes('*') ? true : origins;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Build the application config from environment variables.
 * Read once at startup; nothing re-reads the environment afterwards.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const e = parsed.data;

  return {
    app: {
      name: e.APP_NAME,
      env: e.APP_ENV,
      port: e.APP_PORT,
      debug: e.APP_DEBUG,
    },
    log: {
      level: e.APP_DEBUG ? 'debug' : e.LOG_LEVEL,
    },
    database: {
      connectionString: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      sslMode: e.DB_SSLMODE,
      timezone: e.DB_TIMEZONE,
      statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
    },
    redis: e.REDIS_HOST
      ? {
          host: e.REDIS_HOST,
          port: e.REDIS_PORT,
          password: e.REDIS_PASSWORD,
          db: e.REDIS_DB,
        }
      : undefined,
    jwt: {
      secret: e.JWT_SECRET,
      expireHours: e.JWT_EXPIRE_HOURS,
    },
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      max: e.RATE_LIMIT_MAX,
      loginMax: e.LOGIN_RATE_LIMIT_MAX,
    },
    cors: {
      origin: parseOrigins(e.CORS_ORIGINS),
    },
    seed: {
      password: e.SEED_PASSWORD,
    },
  };
}
