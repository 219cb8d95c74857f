export type { Logger, LogLevel, MaybePromise } from './types';
export { ConsoleLogger, type ConsoleLoggerOptions } from './consoleLogger';
