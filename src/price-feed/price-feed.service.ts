import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PRICE_PROVIDER, PriceProvider } from './price-provider.interface';
import { PricesService } from '../prices/prices.service';
import { CurrencyType } from '../prices/entities/price-entry.entity';

/**
 * Polls the upstream provider and writes quotes into the price store.
 * Disabled unless PRICE_FEED_ENABLED is set; failures are logged and the
 * next tick tries again.
 */
@Injectable()
export class PriceFeedService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PriceFeedService.name);
  private readonly enabled: boolean;
  private readonly intervalMs: number;
  private timer?: NodeJS.Timeout;
  private polling = false;

  constructor(
    @Inject(PRICE_PROVIDER) private readonly provider: PriceProvider,
    private readonly pricesService: PricesService,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<boolean>('PRICE_FEED_ENABLED', false);
    this.intervalMs = configService.get<number>('PRICE_FEED_INTERVAL_MS', 61000);
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log('Price feed disabled');
      return;
    }

    this.logger.log(`Starting ${this.provider.name} price feed, every ${this.intervalMs}ms`);
    void this.poll();
    this.timer = setInterval(() => void this.poll(), this.intervalMs);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * One fetch-and-store cycle.
   * @returns number of entries written
   */
  async refresh(): Promise<number> {
    const quotes = await this.provider.fetchPrices(
      this.pricesService.getKnownSymbols(),
      Object.values(CurrencyType),
    );
    const written = this.pricesService.ingestQuotes(quotes);
    this.logger.log(`Fetched ${quotes.length} prices from ${this.provider.name}, stored ${written}`);
    return written;
  }

  // Skips a tick while the previous fetch is still in flight.
  private async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      await this.refresh();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Error fetching prices: ${err.message}`, err.stack);
    } finally {
      this.polling = false;
    }
  }
}
