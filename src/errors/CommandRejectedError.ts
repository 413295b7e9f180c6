import { TuyaError } from './TuyaError';

/**
 * CommandRejectedError
 *
 * Thrown when Tuya answers a device request with `success: false`.
 */
export class CommandRejectedError extends TuyaError {
  constructor(message = 'Command rejected', code?: number) {
    super(message, code);
    this.name = 'CommandRejectedError';
    Object.setPrototypeOf(this, CommandRejectedError.prototype);
  }
}
