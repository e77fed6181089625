import type { AnalysisAdapter } from '../adapter';

export type FakeResponse = string | Error;

/**
 * Scripted adapter for tests. Responses are consumed in
 * order; the last one repeats. Every prompt is recorded.
 */
export class FakeAnalysisAdapter implements AnalysisAdapter {
  readonly prompts: string[] = [];
  private readonly responses: FakeResponse[];

  constructor(responses: FakeResponse[] = ['<html><body>No security-relevant features found.</body></html>']) {
    this.responses = [...responses];
  }

  id(): string {
    return 'fake';
  }

  model(): string {
    return 'fake-model';
  }

  async analyze(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.length > 1 ? this.responses.shift() : this.responses[0];
    if (next === undefined) {
      throw new Error('FakeAnalysisAdapter has no scripted response');
    }
    if (next instanceof Error) throw next;
    return next;
  }
}
