import { ConfigError } from '@diffwatch/shared';

const REDACTED = '[REDACTED]';

/**
 * An access token scoped to one repository URL.
 *
 * The token is only ever spliced into a URL for the git invocation that needs it;
 * the object itself serializes as `[REDACTED]`.
 */
export class ScopedCredential {
  constructor(private readonly token: string) {
    if (!token) {
      throw new ConfigError('A scoped credential needs a non-empty token');
    }
  }

  /**
   * Returns `url` with the token as its user-info, e.g. `https://<token>@host/path`.
   * Only http(s) URLs carry credentials this way; anything else is returned as-is.
   */
  authenticate(url: string): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return url;
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      return url;
    }
    parsed.username = encodeURIComponent(this.token);
    parsed.password = '';
    return parsed.toString();
  }

  /**
   * Removes every occurrence of the token (raw or URL-encoded) from `text`.
   */
  redact(text: string): string {
    const encoded = encodeURIComponent(this.token);
    let result = text.split(this.token).join(REDACTED);
    if (encoded !== this.token) {
      result = result.split(encoded).join(REDACTED);
    }
    return result;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }
}
