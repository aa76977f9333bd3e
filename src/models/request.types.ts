export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Insertion order is preserved, which keeps the signed body byte-exact. */
export type QueryParams = Record<string, string>;
export type RequestBody = Record<string, string>;

export type Credentials = {
  key: string;
  secret: Buffer;
};

export type RequestDescriptor = {
  method: HttpMethod;
  path: string;
  params?: QueryParams;
  data?: RequestBody;
};

export type SignatureInput = {
  secret: Buffer;
  method: HttpMethod;
  path: string;
  timestamp: string;
  body?: string;
};
