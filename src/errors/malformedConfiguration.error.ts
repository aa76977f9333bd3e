import { ClientError } from './client.error';

export class MalformedConfigurationError extends ClientError {
  constructor(message: string) {
    super('configuration', `Malformed configuration: ${message}`);
    this.name = 'MalformedConfigurationError';
  }
}
