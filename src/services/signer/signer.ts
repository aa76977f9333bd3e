import { AUTH_HEADERS } from '@constants/api.const';
import type { Credentials, HttpMethod, SignatureInput } from '@models/request.types';
import { createHmac } from 'node:crypto';

/** Body is appended only when present; an absent body contributes nothing. */
export const buildStringToSign = (method: HttpMethod, path: string, timestamp: string, body?: string) =>
  body ? `${method}${path}${timestamp}${body}` : `${method}${path}${timestamp}`;

export const signRequest = ({ secret, method, path, timestamp, body }: SignatureInput) =>
  createHmac('sha512', secret).update(buildStringToSign(method, path, timestamp, body), 'utf8').digest('base64');

export const createAuthHeaders = (
  { key, secret }: Credentials,
  method: HttpMethod,
  path: string,
  timestamp: string,
  body?: string,
) => ({
  [AUTH_HEADERS.key]: key,
  [AUTH_HEADERS.timestamp]: timestamp,
  [AUTH_HEADERS.signature]: signRequest({ secret, method, path, timestamp, body }),
});
