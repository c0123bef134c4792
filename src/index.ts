export * from './contexts/crisis-response/index';
export * from './shared/types/index';
export * from './shared/config/index';
export { type LogicalClock, ManualClock } from './shared/clock/index';
export { type Logger, type LoggerOptions, createLogger } from './shared/logging/logger';
