/**
 * @fileoverview Analysis prompt construction.
 *
 * The harvested diff is untrusted repository content. It is fenced between two
 * copies of a random delimiter that the model is told about up front, so text
 * inside the diff cannot convincingly close the block and issue instructions.
 */
import { randomInt } from 'crypto';
import type { ChangeDigest } from '@diffwatch/repo';
import { NO_CHANGES } from '@diffwatch/repo';
import { PromptError } from '@diffwatch/shared';

const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const DELIMITER_TOKEN_LENGTH = 64;
const FENCE = '-'.repeat(14);
const MAX_TOKEN_ATTEMPTS = 8;

// Printable ASCII plus tab, line feed and carriage return.
const NON_PROMPT_CHARS = /[^\t\n\r\x20-\x7e]/g;

export type BuiltPrompt = { kind: 'prompt'; text: string; delimiter: string } | { kind: 'noop' };

export interface PromptBuilderOptions {
  /** Context for the model; empty when unset */
  projectDescription?: string;
  /** Token source, overridable in tests */
  generateToken?: () => string;
}

/**
 * Generates a token of letters and digits from a cryptographically secure source.
 */
export function generateDelimiter(length = DELIMITER_TOKEN_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
}

export function fence(token: string): string {
  return `${FENCE}${token}${FENCE}`;
}

/**
 * Removes every character that is not printable ASCII, tab, CR or LF.
 */
export function sanitizePrompt(text: string): string {
  return text.replace(NON_PROMPT_CHARS, '');
}

export class PromptBuilder {
  private readonly projectDescription: string;
  private readonly generateToken: () => string;

  constructor(options: PromptBuilderOptions = {}) {
    this.projectDescription = options.projectDescription ?? '';
    this.generateToken = options.generateToken ?? (() => generateDelimiter());
  }

  build(digest: ChangeDigest): BuiltPrompt {
    if (digest.kind === 'empty' || digest.text.trim() === NO_CHANGES) {
      return { kind: 'noop' };
    }

    const body = sanitizePrompt(digest.text);
    const delimiter = fence(this.freshToken(body));
    const text = [
      'I am going to show you some commits with the files modified in the project and the code added/modified.',
      `The commits will be placed between the following secret tokens: "${delimiter}".`,
      'You are going to analyze the code and see if there is a new feature added to the project.',
      `Just for you to get some context, the project description is as follows: ${this.projectDescription}.`,
      '',
      delimiter,
      body,
      delimiter,
      '',
      'I am interested to know new features added in these commits to understand if they need to be researched from a security perspective or have some potential vulnerabilities.',
      'Give me the response in HTML format.',
    ].join('\n');

    return { kind: 'prompt', text: sanitizePrompt(text), delimiter };
  }

  private freshToken(body: string): string {
    for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS; attempt++) {
      const token = this.generateToken();
      if (!body.includes(token)) {
        return token;
      }
    }
    throw new PromptError(`Could not generate a delimiter absent from the digest after ${MAX_TOKEN_ATTEMPTS} attempts`);
  }
}
