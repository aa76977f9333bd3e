import { ClientError } from './client.error';

export class MalformedResponseError extends ClientError {
  constructor(status: number, contentType: string | null) {
    super('fetcher', `HTTP response code ${status} returned a non JSON body (content-type: ${contentType ?? 'none'})`);
    this.name = 'MalformedResponseError';
  }
}
