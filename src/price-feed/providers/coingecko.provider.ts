import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { PriceProvider } from '../price-provider.interface';
import { PriceFeedError } from '../price-feed.error';
import { PriceQuote } from '../../prices/entities/price-entry.entity';
import { DEFAULT_COINGECKO_URL } from '../../config/env.validation';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    return `API returned non-200 status: ${error.response.status}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flattens a simple/price body ({ bitcoin: { usd: 1, eur: 2, last_updated_at: 3 } })
 * into one quote per symbol and requested currency.
 */
export function parseSimplePriceResponse(data: unknown, currencies: string[]): PriceQuote[] {
  if (!isRecord(data)) {
    throw new PriceFeedError('Unexpected response shape', 'coingecko');
  }

  const wanted = new Set(currencies.map(currency => currency.toUpperCase()));
  const quotes: PriceQuote[] = [];
  for (const [symbol, byCurrency] of Object.entries(data)) {
    if (!isRecord(byCurrency)) continue;
    for (const [key, amount] of Object.entries(byCurrency)) {
      const type = key.toUpperCase();
      if (!wanted.has(type) || typeof amount !== 'number' || !(amount > 0)) continue;
      quotes.push({ symbol, type, amount });
    }
  }
  return quotes;
}

@Injectable()
export class CoingeckoProvider implements PriceProvider {
  name = 'coingecko';
  private readonly client: AxiosInstance;
  private readonly url: string;
  private readonly precision: number;

  constructor(configService: ConfigService) {
    this.url = configService.get<string>('COINGECKO_URL', DEFAULT_COINGECKO_URL);
    this.precision = configService.get<number>('PRECISION', 6);
    this.client = axios.create({
      timeout: 10000,
      headers: { Accept: 'application/json' },
    });
  }

  async fetchPrices(symbols: string[], currencies: string[]): Promise<PriceQuote[]> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(this.url, {
        params: {
          ids: symbols.join(','),
          vs_currencies: currencies.map(currency => currency.toLowerCase()).join(','),
          precision: String(this.precision),
          include_last_update_at: 'true',
        },
      });
      data = response.data;
    } catch (error) {
      throw new PriceFeedError(`Failed to fetch prices: ${describeError(error)}`, this.name, { cause: error });
    }

    return parseSimplePriceResponse(data, currencies);
  }
}
