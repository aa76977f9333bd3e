import { ClientError } from './client.error';

export class MissingCredentialsError extends ClientError {
  constructor() {
    super('signer', 'api_key or api_secret not set.');
    this.name = 'MissingCredentialsError';
  }
}
