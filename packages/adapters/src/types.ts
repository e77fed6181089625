import type { Logger } from '@diffwatch/shared';

/**
 * Context passed to adapter calls.
 */
export interface AnalysisContext {
  /** Identifier of the current scan run */
  runId?: string;
  logger?: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
}
