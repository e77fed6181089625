import { describe, it, expect } from 'vitest';
import { AnalysisDispatcher, FakeAnalysisAdapter, name } from './index';
import type { AnalysisAdapter } from './index';

describe('@diffwatch/adapters', () => {
  it('exports the dispatcher and the fake adapter behind one interface', async () => {
    const adapters: AnalysisAdapter[] = [new FakeAnalysisAdapter(['ok'])];
    expect(name).toBe('@diffwatch/adapters');
    expect(AnalysisDispatcher).toBeTypeOf('function');
    expect(await adapters[0].analyze('prompt')).toBe('ok');
    expect(adapters[0].id()).toBe('fake');
  });
});
