// Environment schema. ConfigModule runs validateEnv once at boot; ConfigService<Env, true> reads the parsed values.
import { z } from 'zod';

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const csv = z
  .string()
  .default('')
  .transform(s => s.split(',').map(x => x.trim()).filter(Boolean));

const cronExpression = z
  .string()
  .regex(/^[\w*/,?#-]+(\s+[\w*/,?#-]+){4,5}$/, 'expected a cron expression with 5 or 6 fields');

const timeZone = z.string().refine(isTimeZone, 'expected an IANA time zone');

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  GLOBAL_PREFIX: z.string().default(''),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),

  // dataset
  DATA_DIR: z.string().min(1).default('data'),
  DATASET_CACHE_ENABLED: bool.default('true'),
  DATASET_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
  ECB_HIST_URL: z.string().url().default('https://www.ecb.europa.eu/stats/eurofxref/eurofxref-hist.xml'),
  ECB_RECENT_URL: z.string().url().default('https://www.ecb.europa.eu/stats/eurofxref/eurofxref-hist-90d.xml'),
  ECB_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ECB_RETRIES: z.coerce.number().int().min(0).default(2),
  DATASET_REFRESH_CRON: cronExpression.default('0 */30 15-18 * * 1-5'),
  DATASET_REFRESH_TZ: timeZone.default('Europe/Berlin'),

  // http
  RATES_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(300),
  RATE_LIMIT_TTL_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_LIMIT: z.coerce.number().int().positive().default(120),
  CORS_ALLOWED_ORIGINS: csv,
  OPENAPI_SERVER_URL: z.string().url().optional(),
  DOCS_PATH: z.string().default('docs'),

  // maintenance
  MAINTENANCE_API_ENABLED: bool.default('false'),
  MAINTENANCE_ADMIN_TOKEN: z.string().min(1).optional(),
  MAINTENANCE_IP_ALLOWLIST: csv,
});

export type Env = z.infer<typeof EnvSchema>;

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`CONFIG_INVALID: ${issues}`);
  }
  return parsed.data;
}

export function validateEnv(raw: Record<string, unknown>): Env {
  return parseOrThrow(EnvSchema, raw);
}

const RefreshScheduleSchema = EnvSchema.pick({ DATASET_REFRESH_CRON: true, DATASET_REFRESH_TZ: true });

/** The refresh cron, for the decorator that needs it before ConfigModule has loaded. */
export function refreshSchedule(raw: Record<string, unknown> = process.env): { cron: string; timeZone: string } {
  const env = parseOrThrow(RefreshScheduleSchema, raw);
  return { cron: env.DATASET_REFRESH_CRON, timeZone: env.DATASET_REFRESH_TZ };
}
