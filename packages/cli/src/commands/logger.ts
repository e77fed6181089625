import { ConsoleLogger, JsonlLogger } from '@diffwatch/shared';
import type { Logger } from '@diffwatch/shared';
import type { GlobalOptions } from './types';

/**
 * Console logging by default; with --log-file, events are also appended as JSON lines.
 */
export function createLogger(options: GlobalOptions, bindings: Record<string, unknown>): Logger {
  if (options.logFile) {
    return new JsonlLogger(options.logFile, bindings, { verbose: options.verbose });
  }
  return new ConsoleLogger({ verbose: options.verbose }).child(bindings);
}
