import { TokenCache } from '../src/helpers/TokenCache';
import type { TuyaTokens } from '../src/api/response';

const tokens: TuyaTokens = {
  accessToken: 'tok-1',
  refreshToken: 'refresh-1',
  expiresIn: 7200,
  expiresAt: 10000000,
};

describe('TokenCache', () => {
  it('should start expired with no tokens', () => {
    const cache = new TokenCache(1000);

    expect(cache.state(0)).toEqual({ state: 'expired', tokens: undefined });
    expect(cache.refreshDueIn(0)).toBe(0);
  });

  it('should be valid until the margin before expiry', () => {
    const cache = new TokenCache(1000);
    cache.set(tokens);

    expect(cache.state(9998999)).toEqual({ state: 'valid', tokens });
    expect(cache.state(9999000)).toEqual({ state: 'expired', tokens });
    expect(cache.refreshDueIn(9000000)).toBe(999000);
  });

  it('should keep the refresh token when forced to expire', () => {
    const cache = new TokenCache(1000);
    cache.set(tokens);
    cache.expire();

    const state = cache.state(0);
    expect(state.state).toBe('expired');
    expect(state.tokens?.refreshToken).toBe('refresh-1');
  });

  it('should forget everything on clear', () => {
    const cache = new TokenCache();
    cache.set(tokens);
    cache.clear();

    expect(cache.get()).toBeUndefined();
  });
});
