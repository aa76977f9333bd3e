import { ClientError } from './client.error';

export class InvalidDecimalError extends ClientError {
  constructor(property: string, value: unknown) {
    super('client', `Order '${property}' with value ${String(value)} is not a valid decimal.`);
    this.name = 'InvalidDecimalError';
  }
}
