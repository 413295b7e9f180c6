/**
 * Error Types
 *
 * Custom error classes for the Tuya client.
 */

export { TuyaError } from './TuyaError';
export { AuthenticationError } from './AuthenticationError';
export { NetworkError } from './NetworkError';
export { CommandRejectedError } from './CommandRejectedError';
export { DeviceNotFoundError } from './DeviceNotFoundError';
export { DeviceOfflineError } from './DeviceOfflineError';
export { RateLimitError } from './RateLimitError';
export { ConfigurationError } from './ConfigurationError';
