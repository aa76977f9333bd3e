export type OrderSide = 'Bid' | 'Ask';
export type OrderType = 'Limit' | 'Market' | 'Stop Limit' | 'Stop' | 'Take Profit';
export type OrderStatus =
  | 'Accepted'
  | 'Placed'
  | 'Partially Matched'
  | 'Fully Matched'
  | 'Cancelled'
  | 'Partially Cancelled'
  | 'Failed';

/** Filter accepted by the list endpoint: a single status, `open` or `all`. */
export type OrderStatusFilter = 'open' | 'all' | OrderStatus;

export type Order = {
  orderId: string;
  marketId: string;
  side: OrderSide;
  type: OrderType;
  creationTime: string;
  price: string;
  amount: string;
  openAmount: string;
  status: OrderStatus;
};

export type CancelledOrder = {
  orderId: string;
  clientOrderId?: string;
};
