/**
 * packages/utils - Shared runtime helpers
 */

export { LogLevel, logger, createLogger, configureLogger, isLogLevel } from "./logger";
export type { Logger, LogRecord, LogSink } from "./logger";
export { BoundedQueue } from "./bounded-queue";
export type { PushResult } from "./bounded-queue";
export { KeyedLock } from "./keyed-lock";
export { getRetryDelayMs, sleep } from "./retry";
export type { BackoffOptions } from "./retry";
export { toShutdownListener } from "./shutdown";
