import { CommandRejectedError } from './CommandRejectedError';

/**
 * DeviceNotFoundError
 *
 * Thrown when the device id is unknown to the cloud project.
 */
export class DeviceNotFoundError extends CommandRejectedError {
  constructor(
    public readonly deviceId?: string,
    message = deviceId ? `Device not found: ${deviceId}` : 'Device not found',
    code?: number,
  ) {
    super(message, code);
    this.name = 'DeviceNotFoundError';
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}
