/**
 * API Response Types
 *
 * Shapes of the Tuya OpenAPI payloads the client reads and writes.
 */

/**
 * Envelope around every Tuya OpenAPI reply
 */
export interface TuyaApiResponse<T = unknown> {
  success: boolean;
  code?: number;
  msg?: string;
  result?: T;
  t: number;
  tid?: string;
}

/**
 * `result` of GET /v1.0/token and GET /v1.0/token/{refresh_token}
 */
export interface TuyaTokenResult {
  access_token: string;
  refresh_token?: string;
  expire_time: number;
  uid?: string;
}

export interface TuyaTokens {
  accessToken: string;
  refreshToken?: string;
  /** Lifetime reported by Tuya, in seconds */
  expiresIn: number;
  /** Epoch milliseconds */
  expiresAt: number;
  uid?: string;
}

export interface TuyaDeviceStatus {
  code: string;
  value: boolean | number | string;
}

export interface TuyaDeviceCommand {
  code: string;
  value: boolean | number | string | Record<string, unknown>;
}

export interface TuyaDevice {
  id: string;
  name: string;
  uid?: string;
  local_key?: string;
  category?: string;
  product_id?: string;
  product_name?: string;
  sub?: boolean;
  uuid?: string;
  owner_id?: string;
  online?: boolean;
  status?: TuyaDeviceStatus[];
  time_zone?: string;
  ip?: string;
  create_time?: number;
  update_time?: number;
  active_time?: number;
  icon?: string;
  model?: string;
}

/**
 * Entry of the device list: only what a caller needs to pick a device
 */
export interface TuyaDeviceSummary {
  id: string;
  name: string;
}

/**
 * One page of GET /v1.0/iot-01/associated-users/devices
 */
export interface TuyaDeviceListPage {
  devices?: Partial<TuyaDevice>[];
  list?: Partial<TuyaDevice>[];
  has_more?: boolean;
  last_row_key?: string;
  total?: number;
}

export interface TuyaDeviceFunction {
  code: string;
  type: string;
  /** JSON-encoded value spec, e.g. `{}` for a Boolean */
  values: string;
  name?: string;
  desc?: string;
}

export interface TuyaDeviceFunctions {
  category: string;
  functions: TuyaDeviceFunction[];
}

export type SwitchCode = `switch_${number}`;

export type SwitchStates = Record<SwitchCode, boolean>;
