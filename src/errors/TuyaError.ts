/**
 * TuyaError
 *
 * Base class for every error raised by the client. Carries the provider's
 * numeric code when the failure came from a Tuya response.
 */
export class TuyaError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TuyaError';
    Object.setPrototypeOf(this, TuyaError.prototype);
  }
}
