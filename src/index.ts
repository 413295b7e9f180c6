/**
 * Tuya Cloud switch client
 *
 * Wires the OpenAPI client, the device API and optional token persistence
 * from one configuration object.
 */

import type { Logging } from 'homebridge';
import { TuyaDeviceAPI, TuyaOpenAPI } from './api';
import type { TuyaClientConfig } from './config';
import { TokenStorage } from './helpers/TokenStorage';

export interface TuyaClient {
  config: TuyaClientConfig;
  api: TuyaOpenAPI;
  devices: TuyaDeviceAPI;
  storage?: TokenStorage;
  /** Stop background work (auto refresh) */
  close(): void;
}

/**
 * Create a client. With `tokenFile` set, stored tokens are loaded first and
 * every new token is written back.
 */
export async function createTuyaClient(config: TuyaClientConfig, log?: Logging): Promise<TuyaClient> {
  const api = new TuyaOpenAPI(config, log);
  const devices = new TuyaDeviceAPI(api, log);

  let storage: TokenStorage | undefined;
  if (config.tokenFile) {
    const tokenStorage = new TokenStorage(config.tokenFile, log);
    storage = tokenStorage;

    const stored = await tokenStorage.loadTokens();
    if (stored) {
      api.setTokens(stored);
      log?.info('Tokens restored, expires at:', new Date(stored.expiresAt).toLocaleString());
    }

    api.setTokenRefreshCallback((tokens) => {
      log?.debug('Persisting refreshed tokens to storage');
      tokenStorage.saveTokens(tokens).catch((error: unknown) => {
        log?.error('Failed to persist tokens:', error);
      });
    });
  }

  return {
    config,
    api,
    devices,
    storage,
    close: () => api.destroy(),
  };
}

export { loadConfig } from './config';
export type { TuyaClientConfig, Environment } from './config';
export * from './api';
export * from './errors';
export { TokenCache } from './helpers/TokenCache';
export type { TokenState } from './helpers/TokenCache';
export { TokenStorage } from './helpers/TokenStorage';
