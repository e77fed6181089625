import type { AnalysisContext } from './types';

/**
 * Interface for analysis service adapters.
 * An adapter sends one prompt and returns the model's free-text verdict.
 *
 * @example
 * ```typescript
 * class MyAdapter implements AnalysisAdapter {
 *   id() { return 'my-adapter'; }
 *   async analyze(prompt) { return '<html>...</html>'; }
 * }
 * ```
 */
export interface AnalysisAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Model name reported in events.
   */
  model(): string;
  /**
   * Sends a single prompt. No retries; the first failure is final.
   */
  analyze(prompt: string, ctx?: AnalysisContext): Promise<string>;
}
