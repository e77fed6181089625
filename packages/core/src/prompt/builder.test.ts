import { describe, it, expect } from 'vitest';
import type { ChangeDigest } from '@diffwatch/repo';
import { PromptError } from '@diffwatch/shared';
import { PromptBuilder, fence, generateDelimiter, sanitizePrompt } from './builder';

const digestOf = (text: string): ChangeDigest => ({
  kind: 'changes',
  text,
  commits: [],
  commitCount: 1,
  fileCount: 1,
});

const countOf = (haystack: string, needle: string): number => haystack.split(needle).length - 1;

describe('generateDelimiter', () => {
  it('produces 64 letters and digits', () => {
    expect(generateDelimiter()).toMatch(/^[A-Za-z0-9]{64}$/);
  });

  it('is distinct across invocations', () => {
    const tokens = new Set(Array.from({ length: 100 }, () => generateDelimiter()));
    expect(tokens.size).toBe(100);
  });
});

describe('fence', () => {
  it('wraps the token in 14 dashes on each side', () => {
    expect(fence('abc')).toBe('--------------abc--------------');
  });
});

describe('sanitizePrompt', () => {
  it('keeps printable ASCII, tab, CR and LF only', () => {
    expect(sanitizePrompt('café\u0000 ok\t\r\n~☃\u001b[0m')).toBe('caf ok\t\r\n~[0m');
  });
});

describe('PromptBuilder', () => {
  it('maps the empty digest to a no-op', () => {
    expect(new PromptBuilder().build({ kind: 'empty', text: 'No changes.' })).toEqual({ kind: 'noop' });
  });

  it('maps a digest that only says "No changes." to a no-op', () => {
    expect(new PromptBuilder().build(digestOf('No changes.'))).toEqual({ kind: 'noop' });
  });

  it('composes the fenced prompt around the digest', () => {
    const token = 'A'.repeat(64);
    const builder = new PromptBuilder({ projectDescription: 'A web shop', generateToken: () => token });

    const prompt = builder.build(digestOf('Commit abc - 2026-10-01T00:00:00Z\nFile: a.txt\n+one'));

    const delimiter = `--------------${token}--------------`;
    expect(prompt).toEqual({
      kind: 'prompt',
      delimiter,
      text: [
        'I am going to show you some commits with the files modified in the project and the code added/modified.',
        `The commits will be placed between the following secret tokens: "${delimiter}".`,
        'You are going to analyze the code and see if there is a new feature added to the project.',
        'Just for you to get some context, the project description is as follows: A web shop.',
        '',
        delimiter,
        'Commit abc - 2026-10-01T00:00:00Z',
        'File: a.txt',
        '+one',
        delimiter,
        '',
        'I am interested to know new features added in these commits to understand if they need to be researched from a security perspective or have some potential vulnerabilities.',
        'Give me the response in HTML format.',
      ].join('\n'),
    });
  });

  it('uses a fresh random delimiter per build', () => {
    const builder = new PromptBuilder();
    const first = builder.build(digestOf('+x'));
    const second = builder.build(digestOf('+x'));

    if (first.kind !== 'prompt' || second.kind !== 'prompt') throw new Error('expected prompts');
    expect(first.delimiter).not.toBe(second.delimiter);
    expect(first.delimiter).toMatch(/^-{14}[A-Za-z0-9]{64}-{14}$/);
    expect(countOf(first.text, first.delimiter)).toBe(3);
  });

  it('regenerates the token when the digest already contains it', () => {
    const colliding = 'B'.repeat(64);
    const clean = 'C'.repeat(64);
    const tokens = [colliding, clean];
    const builder = new PromptBuilder({ generateToken: () => tokens.shift() ?? 'D'.repeat(64) });

    const prompt = builder.build(digestOf(`+const marker = "${colliding}";`));

    expect(prompt).toMatchObject({ kind: 'prompt', delimiter: fence(clean) });
  });

  it('gives up when every token collides', () => {
    const token = 'E'.repeat(64);
    const builder = new PromptBuilder({ generateToken: () => token });
    expect(() => builder.build(digestOf(token))).toThrow(PromptError);
    expect(() => builder.build(digestOf(token))).toThrow('Could not generate a delimiter');
  });

  it('strips non-ASCII characters from the digest', () => {
    const builder = new PromptBuilder({ generateToken: () => 'F'.repeat(64) });
    const prompt = builder.build(digestOf('+const greeting = "héllo \u{1F600}";'));
    if (prompt.kind !== 'prompt') throw new Error('expected a prompt');
    expect(prompt.text).toContain('+const greeting = "hllo ";');
  });
});
