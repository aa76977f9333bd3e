import { BASE_URL, COMMON_HEADERS, PATHS } from '@constants/api.const';
import { MissingCredentialsError } from '@errors/missingCredentials.error';
import type { Balance, TradingFees } from '@models/account.types';
import type { Market, Orderbook } from '@models/market.types';
import type { CancelledOrder, Order, OrderSide, OrderStatusFilter, OrderType } from '@models/order.types';
import type { Credentials, RequestDescriptor } from '@models/request.types';
import { fetcher } from '@services/fetcher/fetcher.service';
import { debug } from '@services/logger';
import { createAuthHeaders } from '@services/signer/signer';
import { toOrderDecimal } from '@utils/decimal/decimal.utils';
import { buildUrl, compactParams } from '@utils/url/url.utils';
import type { BigSource } from 'big.js';
import { isEmpty, isNil } from 'lodash-es';
import type { ClientOptions } from './client.types';

/**
 * Client for the BTC Markets v3 REST API.
 *
 * State is limited to the immutable credentials and base url. Each call is a single
 * request/response round trip with no retry or timeout.
 *
 * @see https://docs.btcmarkets.net/
 */
export class BtcMarketsClient {
  private readonly baseUrl: string;
  private readonly credentials?: Credentials;

  constructor({ key, secret, baseUrl = BASE_URL }: ClientOptions = {}) {
    this.baseUrl = baseUrl;
    if (!isNil(key) && !isNil(secret))
      this.credentials = { key, secret: Buffer.isBuffer(secret) ? secret : Buffer.from(secret, 'utf8') };
  }

  // Public requests
  /** Active markets including the configuration of each one. */
  public async getActiveMarkets() {
    return this.makePublicCall<Market[]>(PATHS.markets);
  }

  /** @param marketId e.g. `BTC-AUD` */
  public async getMarketOrderbook(marketId: string) {
    return this.makePublicCall<Orderbook>(PATHS.orderbook(marketId));
  }

  // Private requests
  public async getFeeTier() {
    return this.makePrivateCall<TradingFees>({ method: 'GET', path: PATHS.tradingFees });
  }

  public async getBalances() {
    return this.makePrivateCall<Balance[]>({ method: 'GET', path: PATHS.balances });
  }

  public async placeNewOrder(
    marketId: string,
    price: BigSource,
    amount: BigSource,
    orderType: OrderType,
    side: OrderSide,
  ) {
    const data = {
      marketId,
      price: toOrderDecimal('price', price),
      amount: toOrderDecimal('amount', amount),
      type: orderType,
      side,
    };
    return this.makePrivateCall<Order>({ method: 'POST', path: PATHS.orders, data });
  }

  public async replaceOrder(price: BigSource, amount: BigSource, orderId: string) {
    const data = { price: toOrderDecimal('price', price), amount: toOrderDecimal('amount', amount) };
    return this.makePrivateCall<Order>({ method: 'PUT', path: PATHS.order(orderId), data });
  }

  public async listOrders(marketId?: string, status?: OrderStatusFilter) {
    const params = compactParams({ market_id: marketId, status });
    return this.makePrivateCall<Order[]>({ method: 'GET', path: PATHS.orders, params });
  }

  public async getOrder(orderId: string) {
    return this.makePrivateCall<Order>({ method: 'GET', path: PATHS.order(orderId) });
  }

  public async cancelOrder(orderId: string) {
    return this.makePrivateCall<CancelledOrder>({ method: 'DELETE', path: PATHS.order(orderId) });
  }

  /** Cancels every open order, optionally restricted to one market. */
  public async cancelOpenOrders(marketId?: string) {
    const params = compactParams({ market_id: marketId });
    return this.makePrivateCall<CancelledOrder[]>({ method: 'DELETE', path: PATHS.orders, params });
  }

  // Internal methods
  private getSecrets() {
    if (!this.credentials) throw new MissingCredentialsError();
    return this.credentials;
  }

  private async makePublicCall<T>(path: string) {
    debug('client', `GET ${path}`);
    return fetcher.request<T>({ url: buildUrl(this.baseUrl, path), method: 'GET', headers: { ...COMMON_HEADERS } });
  }

  private async makePrivateCall<T>({ method, path, params, data }: RequestDescriptor) {
    const credentials = this.getSecrets();
    // Milliseconds since epoch, the time format expected by the exchange
    const timestamp = String(Date.now());
    const body = isNil(data) || isEmpty(data) ? undefined : JSON.stringify(data);
    const headers = { ...COMMON_HEADERS, ...createAuthHeaders(credentials, method, path, timestamp, body) };

    debug('client', `${method} ${path}`);
    return fetcher.request<T>({ url: buildUrl(this.baseUrl, path, params), method, headers, body });
  }
}
