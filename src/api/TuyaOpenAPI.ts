/**
 * Tuya OpenAPI Client
 *
 * Handles authenticated requests to the Tuya Cloud API. Owns the access
 * token: obtains it with the project's access id/key, refreshes it when it
 * expires and signs every business request with it.
 */

import axios, { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import crypto from 'crypto';
import type { Logging } from 'homebridge';
import type { TuyaClientConfig } from '../config';
import {
  AuthenticationError,
  CommandRejectedError,
  DeviceNotFoundError,
  DeviceOfflineError,
  NetworkError,
  RateLimitError,
  TuyaError,
} from '../errors';
import { TokenCache, TokenState } from '../helpers/TokenCache';
import { TOKEN_REFRESH_MARGIN, TUYA_ERROR_CODES } from '../settings';
import type { TuyaApiResponse, TuyaTokenResult, TuyaTokens } from './response';
import { buildSignedPath, HttpMethod, QueryParams, signedHeaders } from './signing';

export type TokenRefreshCallback = (tokens: TuyaTokens) => void;

export type TuyaOpenAPIConfig = Pick<TuyaClientConfig, 'accessId' | 'accessKey' | 'baseUrl' | 'timeout'>;

export interface RequestOptions {
  query?: QueryParams;
  /** Device the request targets, used in error messages */
  deviceId?: string;
}

/**
 * Delay before retrying a failed background refresh
 */
const AUTO_REFRESH_RETRY = 60 * 1000;

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE'];

const toHttpMethod = (method: string | undefined): HttpMethod => {
  const upper = (method || 'GET').toUpperCase();
  const match = HTTP_METHODS.find(m => m === upper);
  if (!match) {
    throw new Error(`Unsupported HTTP method: ${upper}`);
  }
  return match;
};

const isTuyaEnvelope = <T>(value: unknown): value is TuyaApiResponse<T> =>
  typeof value === 'object' && value !== null && 'success' in value && typeof value.success === 'boolean';

const isTokenInvalid = (code?: number): boolean =>
  code === TUYA_ERROR_CODES.TOKEN_INVALID || code === TUYA_ERROR_CODES.TOKEN_STATUS_INVALID;

/** No answer from Tuya at all: DNS, connection or timeout failure */
const isTransportFailure = (error: unknown): boolean => axios.isAxiosError(error) && !error.response;

const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

export class TuyaOpenAPI {
  private readonly client: AxiosInstance;
  private readonly tokenClient: AxiosInstance;
  private readonly cache: TokenCache;
  private pendingRefresh?: Promise<TuyaTokens>;
  private autoRefresh = false;
  private tokenRefreshTimer?: NodeJS.Timeout;
  private onTokenRefresh?: TokenRefreshCallback;

  constructor(
    private readonly config: TuyaOpenAPIConfig,
    private readonly log?: Logging,
  ) {
    this.cache = new TokenCache(TOKEN_REFRESH_MARGIN);

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
    });

    // Token requests are signed without an access token, so they skip the interceptor
    this.tokenClient = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
    });

    // Add request interceptor for signing
    this.client.interceptors.request.use(
      (requestConfig) => this.signRequest(requestConfig),
      (error) => Promise.reject(error),
    );
  }

  /**
   * Set a callback to be called when tokens are obtained or refreshed
   */
  public setTokenRefreshCallback(callback: TokenRefreshCallback): void {
    this.onTokenRefresh = callback;
  }

  /**
   * Set tokens from storage
   */
  public setTokens(tokens: TuyaTokens): void {
    this.cache.set(tokens);
    this.scheduleTokenRefresh();
  }

  public getTokens(): TuyaTokens | undefined {
    return this.cache.get();
  }

  public getTokenState(): TokenState {
    return this.cache.state();
  }

  public hasValidTokens(): boolean {
    return this.cache.state().state === 'valid';
  }

  /**
   * Exchange the access id/key for a new access token (grant_type=1)
   */
  public async authenticate(): Promise<TuyaTokens> {
    this.log?.info('Requesting access token...');
    return this.requestToken(buildSignedPath('/v1.0/token', { grant_type: 1 }));
  }

  /**
   * Refresh the access token with the refresh token, falling back to a
   * fresh grant when Tuya rejects the refresh or none is stored
   */
  public async refreshAccessToken(): Promise<TuyaTokens> {
    const refreshToken = this.cache.get()?.refreshToken;
    if (!refreshToken) {
      return this.authenticate();
    }

    this.log?.info('Refreshing access token...');
    try {
      return await this.requestToken(`/v1.0/token/${refreshToken}`);
    } catch (error) {
      if (error instanceof AuthenticationError && error.code !== undefined) {
        this.log?.warn(`Token refresh rejected (code ${error.code}), requesting a new token`);
        return this.authenticate();
      }
      throw error;
    }
  }

  /**
   * Return a valid token, refreshing first when there is none or it has expired.
   * Concurrent callers share one refresh.
   */
  public async ensureToken(): Promise<TuyaTokens> {
    const current = this.cache.state();
    if (current.state === 'valid') {
      return current.tokens;
    }

    if (!this.pendingRefresh) {
      this.log?.debug(current.tokens ? 'Access token expired' : 'No access token cached');
      this.pendingRefresh = this.refreshAccessToken().finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    return this.pendingRefresh;
  }

  /**
   * Make an authenticated API request.
   * Resolves only with a successful envelope; every failure is thrown as a typed error.
   */
  public async request<T = unknown>(
    path: string,
    method: HttpMethod = 'GET',
    data?: object,
    options: RequestOptions = {},
  ): Promise<TuyaApiResponse<T>> {
    const url = buildSignedPath(path, options.query);

    await this.tokenForRequest();
    let response = await this.send<T>(url, method, data);

    if (!response.success && isTokenInvalid(response.code)) {
      this.log?.warn('Access token rejected by Tuya, re-authenticating');
      this.cache.expire();
      await this.tokenForRequest();
      response = await this.send<T>(url, method, data);

      if (!response.success && isTokenInvalid(response.code)) {
        throw new AuthenticationError(`Access token rejected after refresh: ${response.msg || 'token invalid'}`, response.code);
      }
    }

    if (!response.success) {
      throw this.toProviderError(response, options.deviceId);
    }

    return response;
  }

  /**
   * ensureToken() for a business request: when the token endpoint cannot be
   * reached the call fails the way any other unreachable request does
   */
  private async tokenForRequest(): Promise<void> {
    try {
      await this.ensureToken();
    } catch (error: unknown) {
      if (error instanceof AuthenticationError && isTransportFailure(error.cause)) {
        throw new NetworkError(`Request to Tuya failed: ${describeError(error.cause)}`, error.cause);
      }
      throw error;
    }
  }

  /**
   * Send a signed request and return Tuya's envelope, successful or not
   */
  private async send<T>(url: string, method: HttpMethod, data?: object): Promise<TuyaApiResponse<T>> {
    this.log?.debug(`${method} ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({ url, method, data });
    } catch (error: unknown) {
      if (error instanceof TuyaError) {
        throw error;
      }
      if (axios.isAxiosError(error) && error.response) {
        const { status, data: body } = error.response;
        if (status === 429) {
          throw new RateLimitError(`Tuya rate limit exceeded on ${method} ${url}`);
        }
        if (status < 500 && isTuyaEnvelope<T>(body)) {
          return body;
        }
        if (status < 500) {
          throw new CommandRejectedError(`Tuya answered HTTP ${status} on ${method} ${url}`);
        }
      }
      this.log?.error(`Request ${method} ${url} failed:`, describeError(error));
      throw new NetworkError(`Request to Tuya failed: ${describeError(error)}`, error);
    }

    const body = response.data;
    if (!isTuyaEnvelope<T>(body)) {
      throw new NetworkError(`Unexpected response from Tuya on ${method} ${url}`);
    }
    this.log?.debug('Response:', JSON.stringify(body));
    return body;
  }

  private toProviderError(response: TuyaApiResponse, deviceId?: string): Error {
    const msg = response.msg || 'Unknown error';
    switch (response.code) {
      case TUYA_ERROR_CODES.SIGN_INVALID:
        return new AuthenticationError(`Request signature rejected: ${msg}`, response.code);
      case TUYA_ERROR_CODES.PERMISSION_DENY:
      case TUYA_ERROR_CODES.DEVICE_NOT_SUPPORTED:
        return new DeviceNotFoundError(deviceId, deviceId ? `Device not found: ${deviceId} (${msg})` : msg, response.code);
      case TUYA_ERROR_CODES.DEVICE_OFFLINE:
        return new DeviceOfflineError(deviceId ? `Device is offline: ${deviceId}` : msg, response.code);
      default:
        return new CommandRejectedError(`Tuya rejected the request (code ${response.code ?? 'unknown'}): ${msg}`, response.code);
    }
  }

  /**
   * GET a token endpoint, signed with the access id/key only
   */
  private async requestToken(path: string): Promise<TuyaTokens> {
    const headers = signedHeaders({
      accessId: this.config.accessId,
      accessKey: this.config.accessKey,
      method: 'GET',
      path,
      timestamp: Date.now().toString(),
      nonce: crypto.randomUUID(),
    });

    let body: unknown;
    try {
      const response = await this.tokenClient.get<unknown>(path, { headers });
      body = response.data;
    } catch (error: unknown) {
      this.log?.error('Token request failed:', describeError(error));
      throw new AuthenticationError(`Token request failed: ${describeError(error)}`, undefined, error);
    }

    if (!isTuyaEnvelope<TuyaTokenResult>(body)) {
      this.log?.error('Unexpected token response:', JSON.stringify(body));
      throw new AuthenticationError('Unexpected response from the Tuya token endpoint');
    }

    const result = body.success ? body.result : undefined;
    if (!result?.access_token || typeof result.expire_time !== 'number') {
      this.log?.error('Token request rejected:', JSON.stringify(body));
      throw new AuthenticationError(`Failed to get access token: ${body.msg || 'Unknown error'}`, body.code ?? -1);
    }

    const previous = this.cache.get();
    const tokens: TuyaTokens = {
      accessToken: result.access_token,
      refreshToken: result.refresh_token,
      expiresIn: result.expire_time,
      expiresAt: Date.now() + result.expire_time * 1000,
      uid: result.uid || previous?.uid,
    };

    this.cache.set(tokens);
    this.scheduleTokenRefresh();
    this.log?.info('Access token obtained, expires in', result.expire_time, 'seconds');

    if (this.onTokenRefresh) {
      this.onTokenRefresh(tokens);
    }

    return tokens;
  }

  /**
   * Sign a request according to Tuya's specification
   */
  private signRequest(config: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
    const tokens = this.cache.get();
    if (!tokens?.accessToken) {
      throw new AuthenticationError('No access token available. Call authenticate() first.');
    }

    const headers = signedHeaders({
      accessId: this.config.accessId,
      accessKey: this.config.accessKey,
      method: toHttpMethod(config.method),
      path: config.url || '',
      body: config.data ? JSON.stringify(config.data) : '',
      accessToken: tokens.accessToken,
      timestamp: Date.now().toString(),
      nonce: crypto.randomUUID(),
    });

    for (const [name, value] of Object.entries(headers)) {
      config.headers.set(name, value);
    }
    config.headers.set('Content-Type', 'application/json');

    return config;
  }

  /**
   * Keep the token fresh in the background until destroy() is called
   */
  public startAutoRefresh(): void {
    this.autoRefresh = true;
    this.scheduleTokenRefresh();
  }

  private scheduleTokenRefresh(delay = this.cache.refreshDueIn()): void {
    if (this.tokenRefreshTimer) {
      clearTimeout(this.tokenRefreshTimer);
      this.tokenRefreshTimer = undefined;
    }

    if (!this.autoRefresh || !this.cache.get()) {
      return;
    }

    this.tokenRefreshTimer = setTimeout(() => {
      this.tokenRefreshTimer = undefined;
      const due = this.cache.refreshDueIn();
      if (due > 0) {
        this.scheduleTokenRefresh(due);
        return;
      }
      this.ensureToken().catch((error: unknown) => {
        this.log?.error('Failed to refresh token:', describeError(error));
        this.scheduleTokenRefresh(AUTO_REFRESH_RETRY);
      });
    }, delay);
  }

  /**
   * Clean up
   */
  public destroy(): void {
    this.autoRefresh = false;
    if (this.tokenRefreshTimer) {
      clearTimeout(this.tokenRefreshTimer);
      this.tokenRefreshTimer = undefined;
    }
  }
}
