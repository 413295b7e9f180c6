import type { Logging } from 'homebridge';
import type { TuyaClientConfig } from '../src/config';

export const BASE_URL = 'https://openapi.example.test';

export const testConfig = (overrides: Partial<TuyaClientConfig> = {}): TuyaClientConfig => ({
  accessId: 'test-id',
  accessKey: 'test-secret',
  baseUrl: BASE_URL,
  deviceId: 'dev-1',
  timeout: 2000,
  debug: false,
  ...overrides,
});

// A mock logger for the tests
export const createMockLogger = (): Logging => ({
  prefix: 'test',
  info: jest.fn(),
  success: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
  log: jest.fn(),
} as unknown as Logging);

export const tokenReply = (accessToken: string, refreshToken = 'refresh-1', expireTime = 7200) => ({
  success: true,
  t: 1700000000000,
  result: {
    access_token: accessToken,
    refresh_token: refreshToken,
    expire_time: expireTime,
    uid: 'uid-1',
  },
});

export const okReply = <T>(result: T) => ({ success: true, t: 1700000000000, result });

export const failReply = (code: number, msg: string) => ({ success: false, t: 1700000000000, code, msg });
