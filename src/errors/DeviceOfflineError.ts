import { CommandRejectedError } from './CommandRejectedError';

/**
 * DeviceOfflineError
 *
 * Thrown when attempting to interact with a device that is offline.
 */
export class DeviceOfflineError extends CommandRejectedError {
  constructor(message = 'Device is offline', code?: number) {
    super(message, code);
    this.name = 'DeviceOfflineError';
    Object.setPrototypeOf(this, DeviceOfflineError.prototype);
  }
}
