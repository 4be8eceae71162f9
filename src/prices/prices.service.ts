import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PriceStoreService } from './price-store.service';
import { SetPriceDto } from './dto/set-price.dto';
import { PriceEntry, PriceQuote, isCurrencyType } from './entities/price-entry.entity';
import { UnknownSymbolException } from '../common/exceptions/unknown-symbol.exception';
import { DEFAULT_TOKENS, parseTokenList } from '../config/env.validation';
import { toDecimal } from '../common/utils/decimal.util';

// Registry-aware writes and reads over the price store.
// Manual updates and upstream quotes both land here.
@Injectable()
export class PricesService {
  private readonly logger = new Logger(PricesService.name);
  private readonly knownSymbols: ReadonlySet<string>;

  constructor(
    private readonly store: PriceStoreService,
    configService: ConfigService,
  ) {
    this.knownSymbols = new Set(parseTokenList(configService.get<string>('TOKENS', DEFAULT_TOKENS)));
  }

  /** Case-insensitive registry check */
  isKnownSymbol(symbol: string): boolean {
    return this.knownSymbols.has(symbol.toLowerCase());
  }

  getKnownSymbols(): string[] {
    return Array.from(this.knownSymbols);
  }

  /**
   * Stores a validated manual update under the registered symbol.
   * @throws UnknownSymbolException if the symbol is not registered
   */
  setPrice(setPriceDto: SetPriceDto): PriceEntry {
    if (!this.isKnownSymbol(setPriceDto.symbol)) {
      throw new UnknownSymbolException(setPriceDto.symbol);
    }

    const entry = this.store.set({
      symbol: setPriceDto.symbol.toLowerCase(),
      amount: toDecimal(setPriceDto.amount),
      type: setPriceDto.type,
    });

    this.logger.log(`Manually set ${entry.symbol} ${entry.type} price: ${entry.amount.toString()}`);
    return entry;
  }

  listPrices(): PriceEntry[] {
    return this.store.list();
  }

  /**
   * Writes upstream quotes in one batch. Quotes for unregistered symbols,
   * unsupported currencies or non-positive amounts are dropped.
   * @returns number of entries written
   */
  ingestQuotes(quotes: PriceQuote[]): number {
    const entries: PriceEntry[] = [];
    for (const quote of quotes) {
      const symbol = quote.symbol.toLowerCase();
      if (!this.knownSymbols.has(symbol) || !isCurrencyType(quote.type)) {
        continue;
      }
      if (!Number.isFinite(quote.amount) || quote.amount <= 0) {
        continue;
      }
      entries.push({ symbol, amount: toDecimal(quote.amount), type: quote.type });
    }

    this.store.setMany(entries);
    entries.forEach(entry => {
      this.logger.debug(`Updated ${entry.symbol} ${entry.type} price: ${entry.amount.toString()}`);
    });
    return entries.length;
  }
}
