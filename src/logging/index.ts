import chalk from 'chalk';
import type { LogLevel, Logger } from './types';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  useColors?: boolean;
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private useColors: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    if (options.quiet) {
      this.level = 'quiet';
    } else if (options.verbose) {
      this.level = 'verbose';
    } else {
      this.level = 'normal';
    }
    this.useColors = options.useColors !== false;
  }

  private colorize(text: string, colorFn: (text: string) => string): string {
    return this.useColors ? colorFn(text) : text;
  }

  info(message: string): void {
    if (this.level === 'quiet') return;
    console.log(this.colorize(`ℹ️  ${message}`, chalk.blue));
  }

  warning(message: string): void {
    if (this.level === 'quiet') return;
    console.warn(this.colorize(`⚠️  ${message}`, chalk.yellow));
  }

  error(message: string): void {
    console.error(this.colorize(`❌ ${message}`, chalk.red));
  }

  debug(message: string): void {
    if (this.level !== 'verbose') return;
    console.log(this.colorize(`🔍 ${message}`, chalk.gray));
  }
}

let activeLogger: Logger = new ConsoleLogger();

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function resetLogger(): void {
  activeLogger = new ConsoleLogger();
}

export function info(message: string): void {
  activeLogger.info(message);
}

export function warning(message: string): void {
  activeLogger.warning(message);
}

export function error(message: string): void {
  activeLogger.error(message);
}

export function debug(message: string): void {
  activeLogger.debug(message);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export { ConsoleLogger };
export type { LogLevel, Logger } from './types';
