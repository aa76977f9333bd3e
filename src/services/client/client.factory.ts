import { getConfig } from '@services/configuration/configuration';
import { BtcMarketsClient } from './btcMarketsClient';

export const createClientFromConfig = () => {
  const config = getConfig();
  const credentials = config.getCredentials();
  return new BtcMarketsClient({ baseUrl: config.getBaseUrl(), key: credentials?.key, secret: credentials?.secret });
};
