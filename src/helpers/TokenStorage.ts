/**
 * Token Storage Helper
 *
 * Persists Tuya tokens to a JSON file so they survive restarts.
 * Tokens are saved when refreshed and loaded on startup.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { Logging } from 'homebridge';
import type { TuyaTokens } from '../api/response';

const isStoredTokens = (value: unknown): value is TuyaTokens =>
  typeof value === 'object' && value !== null
  && 'accessToken' in value && typeof value.accessToken === 'string' && value.accessToken.length > 0
  && 'expiresAt' in value && typeof value.expiresAt === 'number'
  && 'expiresIn' in value && typeof value.expiresIn === 'number'
  && (!('refreshToken' in value) || typeof value.refreshToken === 'string')
  && (!('uid' in value) || typeof value.uid === 'string');

export class TokenStorage {
  constructor(
    private readonly filePath: string,
    private readonly log?: Logging,
  ) {}

  /**
   * Save tokens to persistent storage
   */
  public async saveTokens(tokens: TuyaTokens): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(tokens, null, 2), { encoding: 'utf-8', mode: 0o600 });
      this.log?.debug('Tokens saved to', this.filePath);
    } catch (error) {
      // A failed save only costs a token request on the next run
      this.log?.error('Failed to save tokens:', error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Load tokens from persistent storage, or null when there is nothing usable
   */
  public async loadTokens(): Promise<TuyaTokens | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      this.log?.debug('No stored tokens at', this.filePath);
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(data);
      if (isStoredTokens(parsed)) {
        return parsed;
      }
    } catch (error) {
      this.log?.warn('Stored tokens are not valid JSON:', error instanceof Error ? error.message : String(error));
      return null;
    }
    this.log?.warn('Stored tokens are incomplete, ignoring', this.filePath);
    return null;
  }

  /**
   * Clear stored tokens
   */
  public async clearTokens(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
