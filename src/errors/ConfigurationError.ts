import { TuyaError } from './TuyaError';

export class ConfigurationError extends TuyaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
