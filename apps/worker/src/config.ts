import { z, ZodError, ZodType } from 'zod';

export const WORKER_CONFIG = Symbol('WORKER_CONFIG');
export const RATE_LIMIT_CONFIG = Symbol('RATE_LIMIT_CONFIG');
export const WEBHOOK_CONFIG = Symbol('WEBHOOK_CONFIG');

export class InvalidConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
  }
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const optionalPositive = z.coerce.number().positive().optional();

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

export const workerConfigSchema = z
  .object({
    WORKER_POLL_INTERVAL_MS: positiveInt(1000),
    WORKER_BATCH_SIZE: positiveInt(10),
    WORKER_MAX_CONCURRENT: positiveInt(5),
    WORKER_MAX_RETRIES: nonNegativeInt(3),
    WORKER_RETRY_DELAY_BASE_MS: nonNegativeInt(5000),
    WORKER_RETRY_DELAY_MAX_MS: nonNegativeInt(300_000),
    WORKER_JOB_TIMEOUT_MS: positiveInt(300_000),
    WORKER_STALE_JOB_TIMEOUT_MS: positiveInt(600_000),
    WORKER_SHUTDOWN_TIMEOUT_MS: nonNegativeInt(30_000),
    WORKER_OPERATION_TYPES: commaList,
  })
  .transform((env) => ({
    pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
    batchSize: env.WORKER_BATCH_SIZE,
    maxConcurrent: env.WORKER_MAX_CONCURRENT,
    maxRetries: env.WORKER_MAX_RETRIES,
    retryDelayBaseMs: env.WORKER_RETRY_DELAY_BASE_MS,
    retryDelayMaxMs: env.WORKER_RETRY_DELAY_MAX_MS,
    jobTimeoutMs: env.WORKER_JOB_TIMEOUT_MS,
    staleJobTimeoutMs: env.WORKER_STALE_JOB_TIMEOUT_MS,
    shutdownTimeoutMs: env.WORKER_SHUTDOWN_TIMEOUT_MS,
    /** empty means every registered handler */
    operationTypes: env.WORKER_OPERATION_TYPES,
  }));

export type WorkerConfig = z.output<typeof workerConfigSchema>;

export const rateLimitConfigSchema = z
  .object({
    RATE_LIMIT_REQUESTS_PER_MINUTE: positiveInt(60),
    RATE_LIMIT_REQUESTS_PER_HOUR: positiveInt(1000),
    RATE_LIMIT_REQUESTS_PER_DAY: positiveInt(10_000),
    RATE_LIMIT_TOKENS_PER_MINUTE: optionalPositive,
    RATE_LIMIT_TOKENS_PER_DAY: optionalPositive,
    RATE_LIMIT_COST_PER_DAY: optionalPositive,
    RATE_LIMIT_BURST_SIZE: positiveInt(10),
    RATE_LIMIT_BURST_COOLDOWN_MS: positiveInt(1000),
  })
  .transform((env) => ({
    requestsPerMinute: env.RATE_LIMIT_REQUESTS_PER_MINUTE,
    requestsPerHour: env.RATE_LIMIT_REQUESTS_PER_HOUR,
    requestsPerDay: env.RATE_LIMIT_REQUESTS_PER_DAY,
    tokensPerMinute: env.RATE_LIMIT_TOKENS_PER_MINUTE,
    tokensPerDay: env.RATE_LIMIT_TOKENS_PER_DAY,
    costPerDay: env.RATE_LIMIT_COST_PER_DAY,
    burstSize: env.RATE_LIMIT_BURST_SIZE,
    burstCooldownMs: env.RATE_LIMIT_BURST_COOLDOWN_MS,
  }));

export type RateLimitConfig = z.output<typeof rateLimitConfigSchema>;

export const webhookConfigSchema = z
  .object({
    WEBHOOK_URL: z.string().url().optional(),
    WEBHOOK_HMAC_SECRET: z.string().min(1).optional(),
    WEBHOOK_TIMEOUT_MS: positiveInt(30_000),
    WEBHOOK_MAX_RETRIES: nonNegativeInt(3),
    WEBHOOK_RETRY_DELAY_MS: nonNegativeInt(1000),
  })
  .transform((env) => ({
    url: env.WEBHOOK_URL,
    hmacSecret: env.WEBHOOK_HMAC_SECRET,
    timeoutMs: env.WEBHOOK_TIMEOUT_MS,
    maxRetries: env.WEBHOOK_MAX_RETRIES,
    retryDelayMs: env.WEBHOOK_RETRY_DELAY_MS,
  }));

export type WebhookConfig = z.output<typeof webhookConfigSchema>;

function formatIssues(error: ZodError): string[] {
  return error.issues
    .map((issue) => `${issue.path.join('.') || issue.code}: ${issue.message}`)
    .sort((a, b) => a.localeCompare(b));
}

/** Parses environment variables, failing with every invalid key at once. */
export function loadConfig<T>(
  schema: ZodType<T, z.ZodTypeDef, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): T {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}
