import * as fs from 'fs/promises';
import * as path from 'path';
import type { PipelineEvent } from '../types/events';
import { redact, redactString } from '../redaction';
import { formatPrefix } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL file and writes human messages to the console.
 * Events are redacted before they reach the disk.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: { verbose?: boolean } = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = options.verbose ?? false;
  }

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging never fails the run; the failure is reported on stderr instead.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    await this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, { verbose: this.verbose });
  }

  private withPrefix(message: string): string {
    return redactString(formatPrefix(this.bindings, message)).redacted;
  }
}
