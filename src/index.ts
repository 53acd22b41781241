export * from './cache';
export * from './config';
export * from './stream';
export { ConsoleLogger, resetLogger, setLogger } from './logging';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './logging';
