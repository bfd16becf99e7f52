import { z } from 'zod';
import { ValidationError } from './errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).default('./data/workhub.db'),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ISSUER: z.string().min(1).optional(),
  JWT_AUDIENCE: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type LogLevel = NonNullable<z.infer<typeof envSchema>['LOG_LEVEL']>;

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  databasePath: string;
  jwt: {
    secret: Uint8Array;
    issuer?: string;
    audience?: string;
  };
  corsOrigin: string;
  /** Defaults to `silent` under test and `info` otherwise. */
  logLevel: LogLevel;
}

let cachedConfig: AppConfig | undefined;

/**
 * Parse and validate the process environment.
 * Throws ValidationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid environment configuration: ${invalid.map((i) => i.variable).join(', ')}`,
      { invalid }
    );
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    port: values.PORT,
    host: values.HOST,
    databasePath: values.DATABASE_PATH,
    jwt: {
      secret: new TextEncoder().encode(values.JWT_SECRET),
      issuer: values.JWT_ISSUER,
      audience: values.JWT_AUDIENCE,
    },
    corsOrigin: values.CORS_ORIGIN,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'test' ? 'silent' : 'info'),
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached config (for testing).
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
