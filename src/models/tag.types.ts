export type Tag = 'client' | 'signer' | 'fetcher' | 'configuration';
