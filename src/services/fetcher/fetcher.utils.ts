import { ApiError } from '@errors/api.error';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isJsonContent = (contentType: string | null) => !!contentType && contentType.includes('application/json');

/** Gateways sometimes label HTML or truncated bodies as JSON; those parse to `undefined`. */
export const parseJsonBody = (contentType: string | null, text: string) => {
  if (!isJsonContent(contentType) || text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
};

/** Vendor error bodies look like `{ "code": "InvalidPrice", "message": "..." }`. */
export const toApiError = (status: number, data: unknown) => {
  if (isRecord(data) && 'code' in data && 'message' in data)
    return new ApiError(status, String(data.code), String(data.message));
  return new ApiError(status);
};
