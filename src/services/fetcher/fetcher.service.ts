import { MalformedResponseError } from '@errors/malformedResponse.error';
import { error } from '@services/logger';
import { isUndefined } from 'lodash-es';
import type { Fetcher, Request } from './fetcher.types';
import { parseJsonBody, toApiError } from './fetcher.utils';

const request: Request = async ({ url, method, headers, body }) => {
  try {
    const response = await fetch(url, { method, headers, body });

    const contentType = response.headers.get('Content-Type');
    const text = await response.text();
    const data = parseJsonBody(contentType, text);

    if (response.status !== 200) throw toApiError(response.status, data);
    if (isUndefined(data)) throw new MalformedResponseError(response.status, contentType);

    return data;
  } catch (err) {
    if (err instanceof Error) error('fetcher', `${method} ${url} failed: ${err.message}`);
    throw err;
  }
};

export const fetcher: Fetcher = { request };
