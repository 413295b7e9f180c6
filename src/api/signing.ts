/**
 * Tuya request signing
 *
 * Implements the HMAC-SHA256 signature Tuya requires on every OpenAPI call.
 * Token requests sign `client_id + t + nonce + stringToSign`; business
 * requests add the access token after the client id.
 */

import crypto from 'crypto';
import { TUYA_SIGN_METHOD } from '../settings';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean>;

export interface SignInput {
  accessId: string;
  accessKey: string;
  method: HttpMethod;
  /** Path including the query string, exactly as it will be sent */
  path: string;
  body?: string;
  accessToken?: string;
  timestamp: string;
  nonce: string;
}

export type TuyaSignedHeaders = Record<string, string>;

export const sha256Hex = (payload: string): string =>
  crypto.createHash('sha256').update(payload, 'utf8').digest('hex');

/**
 * Append query parameters sorted by key, without URL encoding.
 * Tuya computes the signature over this form.
 */
export function buildSignedPath(path: string, query?: QueryParams): string {
  if (!query) {
    return path;
  }
  const keys = Object.keys(query).sort();
  if (keys.length === 0) {
    return path;
  }
  const queryString = keys.map(key => `${key}=${String(query[key])}`).join('&');
  return `${path}?${queryString}`;
}

export function buildStringToSign(method: HttpMethod, path: string, body = ''): string {
  return [method, sha256Hex(body), '', path].join('\n');
}

export function sign(input: SignInput): string {
  const stringToSign = buildStringToSign(input.method, input.path, input.body);
  const signStr = input.accessId + (input.accessToken ?? '') + input.timestamp + input.nonce + stringToSign;
  return crypto
    .createHmac('sha256', input.accessKey)
    .update(signStr, 'utf8')
    .digest('hex')
    .toUpperCase();
}

/**
 * Headers for a signed request. `access_token` is only present for business calls.
 */
export function signedHeaders(input: SignInput): TuyaSignedHeaders {
  const headers: TuyaSignedHeaders = {
    'client_id': input.accessId,
    't': input.timestamp,
    'sign': sign(input),
    'sign_method': TUYA_SIGN_METHOD,
    'nonce': input.nonce,
  };
  if (input.accessToken) {
    headers['access_token'] = input.accessToken;
  }
  return headers;
}
