import { isNil } from 'lodash-es';
import { ClientError } from './client.error';

export class ApiError extends ClientError {
  constructor(
    public readonly status: number,
    public readonly code?: string,
    public readonly apiMessage?: string,
  ) {
    const message =
      !isNil(code) && !isNil(apiMessage)
        ? `HTTP response code ${status}; ${code}-${apiMessage}`
        : `HTTP response code ${status}`;
    super('client', message);
    this.name = 'ApiError';
  }
}
