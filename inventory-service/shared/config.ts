import { z } from 'zod';

const port = z.coerce.number().int().min(0).max(65535);

const ConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    WRITE_PORT: port.default(3000),
    READ_PORT: port.default(3001),
    DB_SECRET_ARN: z.string().min(1).optional(),
    DB_WRITER_ENDPOINT: z.string().min(1).default('localhost'),
    DB_READER_ENDPOINT: z.string().min(1).optional(),
    DB_PORT: port.default(5432),
    DB_NAME: z.string().min(1).default('inventory'),
    DB_USER: z.string().min(1).default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    API_URL: z.string().url().default('http://localhost:3000'),
  })
  .transform((env) => ({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    writePort: env.WRITE_PORT,
    readPort: env.READ_PORT,
    apiUrl: env.API_URL,
    db: {
      secretArn: env.DB_SECRET_ARN,
      writerEndpoint: env.DB_WRITER_ENDPOINT,
      readerEndpoint: env.DB_READER_ENDPOINT ?? env.DB_WRITER_ENDPOINT,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      poolMax: env.DB_POOL_MAX,
    },
  }));

export type AppConfig = z.infer<typeof ConfigSchema>;
export type DbConfig = AppConfig['db'];

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}
