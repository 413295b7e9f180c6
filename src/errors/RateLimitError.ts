import { TuyaError } from './TuyaError';

/**
 * RateLimitError
 *
 * Thrown when the Tuya API rate limit has been exceeded.
 */
export class RateLimitError extends TuyaError {
  constructor(message = 'Rate limit exceeded') {
    super(message);
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}
