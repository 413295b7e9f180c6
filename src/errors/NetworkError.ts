import { TuyaError } from './TuyaError';

/**
 * NetworkError
 *
 * Thrown on transport failures: unreachable host, timeout, or a 5xx reply.
 */
export class NetworkError extends TuyaError {
  constructor(message = 'Network request failed', cause?: unknown) {
    super(message, undefined, cause);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}
