/**
 * Tuya API Module
 *
 * Re-exports all API classes for convenient importing.
 */

export { TuyaOpenAPI } from './TuyaOpenAPI';
export type { TokenRefreshCallback, TuyaOpenAPIConfig, RequestOptions } from './TuyaOpenAPI';

export { TuyaDeviceAPI, isOn, switchCode } from './TuyaDeviceAPI';

export { sign, signedHeaders, buildSignedPath, buildStringToSign, sha256Hex } from './signing';
export type { HttpMethod, QueryParams, SignInput, TuyaSignedHeaders } from './signing';

export type {
  TuyaApiResponse,
  TuyaTokenResult,
  TuyaTokens,
  TuyaDevice,
  TuyaDeviceStatus,
  TuyaDeviceCommand,
  TuyaDeviceSummary,
  TuyaDeviceListPage,
  TuyaDeviceFunction,
  TuyaDeviceFunctions,
  SwitchCode,
  SwitchStates,
} from './response';
