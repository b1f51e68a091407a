import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().min(1).optional(),
});

const positiveInt = () => z.coerce.number().int().positive();

export const GatewayConfigSchema = BaseConfigSchema.merge(RedisConfigSchema).extend({
  GATEWAY_HOST: z.string().default('0.0.0.0'),
  GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  MAX_PAYLOAD_BYTES: positiveInt().default(4096),
  MESSAGE_TTL_SECONDS: positiveInt().default(86_400),
  RATE_LIMIT_PER_MINUTE: positiveInt().default(30),
  MAX_ROOM_MESSAGES: positiveInt().default(1000),
  MEMORY_HISTORY_SIZE: positiveInt().default(100),
  HISTORY_REPLAY_LIMIT: positiveInt().default(50),
  DURABLE_TIMEOUT_MS: positiveInt().default(3_000),

  OUTBOUND_QUEUE_SIZE: positiveInt().default(256),
  MAX_FRAME_BYTES: positiveInt().default(16_384),
  KEEPALIVE_INTERVAL_MS: positiveInt().default(54_000),
  PONG_TIMEOUT_MS: positiveInt().default(60_000),
  WRITE_TIMEOUT_MS: positiveInt().default(10_000),

  ROOM_SWEEP_INTERVAL_MS: positiveInt().default(1_800_000),
  ROOM_MAX_IDLE_MS: positiveInt().default(86_400_000),
  HISTORY_SWEEP_INTERVAL_MS: positiveInt().default(3_600_000),
  LIMITER_SWEEP_INTERVAL_MS: positiveInt().default(3_600_000),
  LIMITER_MAX_IDLE_MS: positiveInt().default(86_400_000),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
