import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print structured events and debug messages */
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: PipelineEvent): void {
    if (!this.verbose) return;
    console.log(JSON.stringify(event));
  }

  trace(event: PipelineEvent, message: string): void {
    if (this.verbose) {
      console.log(message, JSON.stringify(event));
    } else {
      console.log(message);
    }
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(message);
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent) {
    return this.base.log(event);
  }

  trace(event: PipelineEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return formatPrefix(this.bindings, message);
  }
}

export function formatPrefix(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
