/**
 * Owned cache for the Speech service bearer token.
 *
 * Tokens are valid for ten minutes upstream. The cache keeps one token with
 * an expiry timestamp and only asks for a new one once that has passed.
 * Concurrent callers during a refresh share the same in-flight request.
 */

const DEFAULT_TTL_MS = 9 * 60 * 1000;

export interface SpeechTokenCacheOptions {
  /** Performs the actual token request. */
  readonly fetchToken: () => Promise<string>;
  /** How long a fetched token is reused. Default: 9 minutes */
  readonly ttlMs?: number;
  /** Clock, injectable for tests. Default: Date.now */
  readonly now?: () => number;
}

export class SpeechTokenCache {
  private readonly fetchToken: () => Promise<string>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private token: string | null = null;
  private expiresAtMs = 0;
  private pending: Promise<string> | null = null;

  constructor(options: Readonly<SpeechTokenCacheOptions>) {
    this.fetchToken = options.fetchToken;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether a token is cached and not yet expired.
   */
  get hasValidToken(): boolean {
    return this.token !== null && this.now() < this.expiresAtMs;
  }

  /**
   * Expiry of the cached token in epoch milliseconds, or null when empty.
   */
  get expiresAt(): number | null {
    return this.token === null ? null : this.expiresAtMs;
  }

  /**
   * Return the cached token, fetching a new one when none is valid.
   * A failed fetch leaves the cache empty and rejects every waiting caller.
   */
  async getToken(): Promise<string> {
    if (this.token !== null && this.now() < this.expiresAtMs) {
      return this.token;
    }

    if (this.pending) {
      return this.pending;
    }

    // Expiry counts from when the token was requested, not received
    const requestedAt = this.now();
    this.pending = this.fetchToken()
      .then((token) => {
        this.token = token;
        this.expiresAtMs = requestedAt + this.ttlMs;
        return token;
      })
      .finally(() => {
        this.pending = null;
      });

    return this.pending;
  }

  /**
   * Drop the cached token, e.g. after the service rejected it.
   */
  invalidate(): void {
    this.token = null;
    this.expiresAtMs = 0;
  }
}

export function createSpeechTokenCache(
  options: Readonly<SpeechTokenCacheOptions>
): SpeechTokenCache {
  return new SpeechTokenCache(options);
}
