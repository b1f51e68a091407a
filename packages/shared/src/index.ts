export { createLogger, type SafeLogger } from './logger';
export { AppError, ErrorCode, errorMessage } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type GatewayConfig,
  BaseConfigSchema,
  RedisConfigSchema,
  GatewayConfigSchema,
} from './config';
export {
  MessageIdGenerator,
  generateUserId,
  generateConnectionId,
  randomString,
} from './id';
export { TokenBucketRateLimiter } from './rate-limiter';
export { initRedis, closeRedis, type RedisOptions } from './redis';
export {
  RedisMessageStore,
  messageKey,
  roomIndexKey,
  roomIdFromIndexKey,
  parseStoredMessage,
  assertExecSucceeded,
  type RedisMessageStoreOptions,
} from './message-store';
