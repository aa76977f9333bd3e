export type Market = {
  marketId: string;
  baseAssetName: string;
  quoteAssetName: string;
  minOrderAmount: string;
  maxOrderAmount: string;
  amountDecimals: string;
  priceDecimals: string;
  status: string;
};

/** Each level is a `[price, amount]` pair of decimal strings. */
export type OrderbookLevel = [string, string];

export type Orderbook = {
  marketId: string;
  snapshotId: number;
  asks: OrderbookLevel[];
  bids: OrderbookLevel[];
};
