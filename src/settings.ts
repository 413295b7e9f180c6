/**
 * Name used as the log prefix and the CLI binary name.
 */
export const CLIENT_NAME = 'tuya-switch';

/**
 * Default HTTP timeout for Tuya requests, in milliseconds.
 */
export const TUYA_REQUEST_TIMEOUT = 10000;

/**
 * Tokens are treated as expired this long before Tuya's own expiry, in milliseconds.
 */
export const TOKEN_REFRESH_MARGIN = 60 * 1000;

export const TUYA_SIGN_METHOD = 'HMAC-SHA256';

/**
 * Number of gangs on the switch this client drives (switch_1 .. switch_4).
 */
export const SWITCH_CHANNELS = 4;

/**
 * Page size used when listing the project's devices.
 */
export const DEVICE_LIST_PAGE_SIZE = 50;

/**
 * Tuya response codes the client reacts to.
 */
export const TUYA_ERROR_CODES = {
  SIGN_INVALID: 1004,
  TOKEN_INVALID: 1010,
  TOKEN_STATUS_INVALID: 1011,
  PERMISSION_DENY: 1106,
  DEVICE_OFFLINE: 2001,
  DEVICE_NOT_SUPPORTED: 2009,
} as const;
