import { PriceQuote } from '../prices/entities/price-entry.entity';

export const PRICE_PROVIDER = Symbol('PRICE_PROVIDER');

export interface PriceProvider {
  name: string;

  // Current quotes for every requested symbol/currency the upstream knows.
  fetchPrices(symbols: string[], currencies: string[]): Promise<PriceQuote[]>;
}
