import { ORDER_DECIMALS } from '@constants/api.const';
import { InvalidDecimalError } from '@errors/invalidDecimal.error';
import Big from 'big.js';
import type { BigSource } from 'big.js';

/** Fixed-point rendering expected by the order endpoints, e.g. `0.1` → `"0.10000000"`. */
export const toOrderDecimal = (property: string, value: BigSource, decimals = ORDER_DECIMALS) => {
  let decimal: Big;
  try {
    decimal = new Big(value);
  } catch {
    throw new InvalidDecimalError(property, value);
  }
  return decimal.toFixed(decimals, Big.roundHalfEven);
};
