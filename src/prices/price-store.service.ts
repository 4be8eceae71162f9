import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CurrencyType, PriceEntry } from './entities/price-entry.entity';
import { isPositiveAmount } from '../common/utils/decimal.util';

/**
 * In-memory price book: symbol -> currency -> amount.
 * Every method is synchronous, so each call runs to completion on the
 * event loop before any other request can read or write the map.
 */
@Injectable()
export class PriceStoreService {
  private prices: Map<string, Map<CurrencyType, Decimal>> = new Map();

  /**
   * Stores or overwrites the entry for (symbol, type).
   * @throws Error if amount <= 0
   */
  set(entry: PriceEntry): PriceEntry {
    this.assertPositive(entry);
    this.write(entry);
    return entry;
  }

  /**
   * Batch write - validates all before applying.
   * @throws Error on first invalid amount, leaving the store untouched
   */
  setMany(entries: PriceEntry[]): void {
    entries.forEach(entry => this.assertPositive(entry));
    entries.forEach(entry => this.write(entry));
  }

  /** O(1) lookup - undefined if the pair was never set */
  get(symbol: string, type: CurrencyType): Decimal | undefined {
    return this.prices.get(symbol)?.get(type);
  }

  /** Snapshot ordered by first write of each symbol, then of each currency */
  list(): PriceEntry[] {
    const entries: PriceEntry[] = [];
    this.prices.forEach((byType, symbol) => {
      byType.forEach((amount, type) => {
        entries.push({ symbol, amount, type });
      });
    });
    return entries;
  }

  size(): number {
    let count = 0;
    this.prices.forEach(byType => {
      count += byType.size;
    });
    return count;
  }

  /** Empties the book - test harness only */
  clear(): void {
    this.prices.clear();
  }

  private write(entry: PriceEntry): void {
    let byType = this.prices.get(entry.symbol);
    if (!byType) {
      byType = new Map();
      this.prices.set(entry.symbol, byType);
    }
    byType.set(entry.type, entry.amount);
  }

  private assertPositive(entry: PriceEntry): void {
    if (!isPositiveAmount(entry.amount)) {
      throw new Error(
        `Price must be positive, got ${entry.amount.toString()} for ${entry.symbol} ${entry.type}`,
      );
    }
  }
}
