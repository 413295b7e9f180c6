import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

const fullEnv = {
  TUYA_ACCESS_ID: 'test-id',
  TUYA_ACCESS_KEY: 'test-secret',
  TUYA_BASE_URL: 'https://openapi.example.test/',
  DEVICE_ID: 'dev-1',
};

describe('loadConfig', () => {
  it('should build the config with defaults', () => {
    expect(loadConfig(fullEnv)).toEqual({
      accessId: 'test-id',
      accessKey: 'test-secret',
      baseUrl: 'https://openapi.example.test',
      deviceId: 'dev-1',
      timeout: 10000,
      tokenFile: undefined,
      debug: false,
    });
  });

  it('should read the optional settings', () => {
    const config = loadConfig({
      ...fullEnv,
      TUYA_TIMEOUT: '2500',
      TUYA_TOKEN_FILE: '/tmp/tokens.json',
      TUYA_DEBUG: 'true',
    });

    expect(config.timeout).toBe(2500);
    expect(config.tokenFile).toBe('/tmp/tokens.json');
    expect(config.debug).toBe(true);
  });

  it('should report every missing or blank variable at once', () => {
    const env = { TUYA_ACCESS_ID: 'test-id', TUYA_ACCESS_KEY: '   ', TUYA_BASE_URL: 'https://openapi.example.test' };

    expect(() => loadConfig(env)).toThrow(ConfigurationError);
    expect(() => loadConfig(env)).toThrow('Missing required environment variables: TUYA_ACCESS_KEY, DEVICE_ID');
  });

  it('should reject a base URL that is not http(s)', () => {
    expect(() => loadConfig({ ...fullEnv, TUYA_BASE_URL: 'not a url' }))
      .toThrow('TUYA_BASE_URL is not a valid URL: not a url');
    expect(() => loadConfig({ ...fullEnv, TUYA_BASE_URL: 'ftp://openapi.example.test' }))
      .toThrow('TUYA_BASE_URL must use http or https: ftp://openapi.example.test');
  });

  it('should reject a timeout that is not a positive integer', () => {
    expect(() => loadConfig({ ...fullEnv, TUYA_TIMEOUT: '0' }))
      .toThrow('TUYA_TIMEOUT must be a positive integer (got "0")');
  });
});
