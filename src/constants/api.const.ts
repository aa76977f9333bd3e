export const BASE_URL = 'https://api.btcmarkets.net';

export const ORDER_DECIMALS = 8;

export const COMMON_HEADERS = {
  Accept: 'application/json',
  'Accept-Charset': 'UTF-8',
  'Content-Type': 'application/json',
} as const;

export const AUTH_HEADERS = {
  key: 'BM-AUTH-APIKEY',
  timestamp: 'BM-AUTH-TIMESTAMP',
  signature: 'BM-AUTH-SIGNATURE',
} as const;

export const PATHS = {
  markets: '/v3/markets',
  orderbook: (marketId: string) => `/v3/markets/${encodeURIComponent(marketId)}/orderbook`,
  tradingFees: '/v3/accounts/me/trading-fees',
  balances: '/v3/accounts/me/balances',
  orders: '/v3/orders',
  order: (orderId: string) => `/v3/orders/${encodeURIComponent(orderId)}`,
} as const;
