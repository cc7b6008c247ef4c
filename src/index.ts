export * from './models';
export * from './errors';
export * from './config/settings';
export * from './parser';
export * from './memory';
export * from './registry';
export * from './engine';
export * from './pipeline';
export { createLogger, setLogLevel, getLogLevel, type LogLevel, type Logger } from './utils/logger';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy } from './utils/retry';
export { joinWithTimeout, type JoinResult } from './utils/async';
