/**
 * Configuration Types
 *
 * Credentials and options for the Tuya client, built once from the
 * environment and passed explicitly to everything that needs them.
 */

import { ConfigurationError } from './errors';
import { TUYA_REQUEST_TIMEOUT } from './settings';

export interface TuyaClientConfig {
  /** Cloud project access id (client_id) */
  accessId: string;
  /** Cloud project access key (client secret) */
  accessKey: string;
  /** Data center endpoint, e.g. https://openapi.tuyaeu.com */
  baseUrl: string;
  /** Default device the CLI acts on */
  deviceId: string;
  /** HTTP timeout in milliseconds */
  timeout: number;
  /** Where to persist tokens between runs; unset keeps them in memory */
  tokenFile?: string;
  debug: boolean;
}

export type Environment = Record<string, string | undefined>;

const REQUIRED_VARIABLES = [
  'TUYA_ACCESS_ID',
  'TUYA_ACCESS_KEY',
  'TUYA_BASE_URL',
  'DEVICE_ID',
] as const;

type RequiredVariable = typeof REQUIRED_VARIABLES[number];

const read = (env: Environment, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

const parseTimeout = (raw: string | undefined): number => {
  if (raw === undefined) {
    return TUYA_REQUEST_TIMEOUT;
  }
  const timeout = Number(raw);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`TUYA_TIMEOUT must be a positive integer (got "${raw}")`);
  }
  return timeout;
};

const parseBaseUrl = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(`TUYA_BASE_URL is not a valid URL: ${raw}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigurationError(`TUYA_BASE_URL must use http or https: ${raw}`);
  }
  return raw.replace(/\/+$/, '');
};

const parseFlag = (raw: string | undefined): boolean => {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
};

/**
 * Build the client configuration from an environment map (usually `process.env`
 * after dotenv has loaded `.env`). Every missing required variable is reported
 * in one error.
 */
export function loadConfig(env: Environment): TuyaClientConfig {
  const values: Partial<Record<RequiredVariable, string>> = {};
  const missing: string[] = [];

  for (const name of REQUIRED_VARIABLES) {
    const value = read(env, name);
    if (value === undefined) {
      missing.push(name);
    } else {
      values[name] = value;
    }
  }

  const { TUYA_ACCESS_ID, TUYA_ACCESS_KEY, TUYA_BASE_URL, DEVICE_ID } = values;
  if (!TUYA_ACCESS_ID || !TUYA_ACCESS_KEY || !TUYA_BASE_URL || !DEVICE_ID) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  return {
    accessId: TUYA_ACCESS_ID,
    accessKey: TUYA_ACCESS_KEY,
    baseUrl: parseBaseUrl(TUYA_BASE_URL),
    deviceId: DEVICE_ID,
    timeout: parseTimeout(read(env, 'TUYA_TIMEOUT')),
    tokenFile: read(env, 'TUYA_TOKEN_FILE'),
    debug: parseFlag(read(env, 'TUYA_DEBUG')),
  };
}
