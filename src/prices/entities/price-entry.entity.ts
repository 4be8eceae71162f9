import Decimal from 'decimal.js';

export enum CurrencyType {
  USD = 'USD',
  EUR = 'EUR',
}

const CURRENCY_TYPES: ReadonlySet<string> = new Set<string>(Object.values(CurrencyType));

export function isCurrencyType(value: string): value is CurrencyType {
  return CURRENCY_TYPES.has(value);
}

// Current price of one symbol in one currency.
// The store keeps at most one entry per (symbol, type) pair.
export interface PriceEntry {
  symbol: string;             // registered symbol, lower-case
  amount: Decimal;            // always > 0
  type: CurrencyType;
}

// Raw quote from an upstream source, before registry and currency filtering.
export interface PriceQuote {
  symbol: string;
  type: string;
  amount: number;
}
