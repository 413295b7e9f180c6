import { TuyaError } from './TuyaError';

/**
 * AuthenticationError
 *
 * Thrown when Tuya rejects the access id/key, the signature, or the token
 * (even after a refresh), or when the token request cannot be sent.
 */
export class AuthenticationError extends TuyaError {
  constructor(message = 'Authentication failed', code?: number, cause?: unknown) {
    super(message, code, cause);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}
