import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { CoingeckoProvider, parseSimplePriceResponse } from './coingecko.provider';
import { PriceFeedError } from '../price-feed.error';

describe('CoingeckoProvider', () => {
  const createProvider = () =>
    new CoingeckoProvider(
      new ConfigService({ COINGECKO_URL: 'http://coingecko.test/simple/price', PRECISION: 4 }),
    );

  const okResponse = (data: unknown): AxiosResponse<unknown> => ({
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

  describe('parseSimplePriceResponse', () => {
    it('should emit one quote per symbol and currency', () => {
      const quotes = parseSimplePriceResponse(
        {
          bitcoin: { usd: 65000.5, eur: 60000, last_updated_at: 1718000000 },
          ethereum: { usd: 3200 },
        },
        ['USD', 'EUR'],
      );

      expect(quotes).toEqual([
        { symbol: 'bitcoin', type: 'USD', amount: 65000.5 },
        { symbol: 'bitcoin', type: 'EUR', amount: 60000 },
        { symbol: 'ethereum', type: 'USD', amount: 3200 },
      ]);
    });

    it('should skip currencies that were not requested', () => {
      const quotes = parseSimplePriceResponse({ bitcoin: { usd: 1, gbp: 2 } }, ['USD']);

      expect(quotes).toEqual([{ symbol: 'bitcoin', type: 'USD', amount: 1 }]);
    });

    it('should skip non-numeric and non-positive amounts', () => {
      const quotes = parseSimplePriceResponse(
        { bitcoin: { usd: '100', eur: 0 }, ethereum: { usd: -5 }, solana: null },
        ['USD', 'EUR'],
      );

      expect(quotes).toEqual([]);
    });

    it('should throw PriceFeedError for a non-object body', () => {
      expect(() => parseSimplePriceResponse(['bitcoin'], ['USD'])).toThrow(PriceFeedError);
    });
  });

  describe('fetchPrices', () => {
    it('should query the configured endpoint with ids, currencies and precision', async () => {
      const provider = createProvider();
      const get = jest
        .spyOn(provider['client'], 'get')
        .mockResolvedValue(okResponse({ bitcoin: { usd: 100, eur: 90 } }));

      const quotes = await provider.fetchPrices(['bitcoin', 'ethereum'], ['USD', 'EUR']);

      expect(get).toHaveBeenCalledWith('http://coingecko.test/simple/price', {
        params: {
          ids: 'bitcoin,ethereum',
          vs_currencies: 'usd,eur',
          precision: '4',
          include_last_update_at: 'true',
        },
      });
      expect(quotes).toEqual([
        { symbol: 'bitcoin', type: 'USD', amount: 100 },
        { symbol: 'bitcoin', type: 'EUR', amount: 90 },
      ]);
    });

    it('should wrap HTTP errors with the upstream status', async () => {
      const provider = createProvider();
      const response: AxiosResponse<unknown> = { ...okResponse({}), status: 429, statusText: 'Too Many Requests' };
      jest
        .spyOn(provider['client'], 'get')
        .mockRejectedValue(new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, response));

      await expect(provider.fetchPrices(['bitcoin'], ['USD'])).rejects.toThrow(
        'Failed to fetch prices: API returned non-200 status: 429',
      );
    });

    it('should wrap transport errors', async () => {
      const provider = createProvider();
      jest.spyOn(provider['client'], 'get').mockRejectedValue(new Error('socket hang up'));

      const result = provider.fetchPrices(['bitcoin'], ['USD']);

      await expect(result).rejects.toBeInstanceOf(PriceFeedError);
      await expect(result).rejects.toThrow('Failed to fetch prices: socket hang up');
    });
  });
});
