export { BtcMarketsClient } from '@services/client/btcMarketsClient';
export { createClientFromConfig } from '@services/client/client.factory';
export type { ClientOptions } from '@services/client/client.types';
export { buildStringToSign, createAuthHeaders, signRequest } from '@services/signer/signer';
export { ClientError } from '@errors/client.error';
export { ApiError } from '@errors/api.error';
export { MissingCredentialsError } from '@errors/missingCredentials.error';
export { MalformedResponseError } from '@errors/malformedResponse.error';
export { InvalidDecimalError } from '@errors/invalidDecimal.error';
export { MalformedConfigurationError } from '@errors/malformedConfiguration.error';
export type { Balance, MarketFee, TradingFees } from '@models/account.types';
export type { Market, Orderbook, OrderbookLevel } from '@models/market.types';
export type { CancelledOrder, Order, OrderSide, OrderStatus, OrderStatusFilter, OrderType } from '@models/order.types';
export type { Credentials, HttpMethod, QueryParams, RequestBody, RequestDescriptor } from '@models/request.types';
