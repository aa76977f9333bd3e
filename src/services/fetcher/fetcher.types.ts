import type { HttpMethod } from '@models/request.types';

export type RequestFetch = {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
};

export type Request = <T>({ url, method, headers, body }: RequestFetch) => Promise<T>;

export type Fetcher = {
  request: Request;
};
