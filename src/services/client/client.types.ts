export type ClientOptions = {
  key?: string;
  /** Raw secret bytes; a string is taken as its UTF-8 bytes. */
  secret?: string | Buffer;
  baseUrl?: string;
};
