import type { TuyaTokens } from '../api/response';
import { TOKEN_REFRESH_MARGIN } from '../settings';

export type TokenState =
  | { state: 'valid'; tokens: TuyaTokens }
  | { state: 'expired'; tokens?: TuyaTokens };

/**
 * Holds the access token owned by one client.
 * A token is valid until `expiresAt - margin`; after that, or when nothing
 * is stored, the state is `expired` and the next call must refresh.
 */
export class TokenCache {
  private tokens?: TuyaTokens;

  constructor(private readonly margin = TOKEN_REFRESH_MARGIN) {}

  /**
   * Current state. An expired entry keeps its tokens so the refresh token stays usable.
   */
  public state(now = Date.now()): TokenState {
    if (this.tokens && now < this.tokens.expiresAt - this.margin) {
      return { state: 'valid', tokens: this.tokens };
    }
    return { state: 'expired', tokens: this.tokens };
  }

  public get(): TuyaTokens | undefined {
    return this.tokens;
  }

  public set(tokens: TuyaTokens): void {
    this.tokens = tokens;
  }

  /**
   * Force the next call to refresh, keeping the refresh token
   */
  public expire(): void {
    if (this.tokens) {
      this.tokens = { ...this.tokens, expiresAt: 0 };
    }
  }

  public clear(): void {
    this.tokens = undefined;
  }

  /**
   * Milliseconds until the token should be refreshed; 0 when already due
   */
  public refreshDueIn(now = Date.now()): number {
    if (!this.tokens) {
      return 0;
    }
    return Math.max(0, this.tokens.expiresAt - this.margin - now);
  }
}
