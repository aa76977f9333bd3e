export type Balance = {
  assetName: string;
  balance: string;
  available: string;
  locked: string;
};

export type MarketFee = {
  makerFeeRate: string;
  takerFeeRate: string;
  marketId: string;
};

export type TradingFees = {
  volume30Day: string;
  feeByMarkets: MarketFee[];
};
