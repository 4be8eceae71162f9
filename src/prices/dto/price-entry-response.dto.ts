import { PriceEntry } from '../entities/price-entry.entity';
import { toNumber } from '../../common/utils/decimal.util';

// Wire form of a price entry. Capitalised keys are part of the public contract.
export interface PriceEntryResponseDto {
  Symbol: string;
  Amount: number;
  Type: string;
}

export function toPriceEntryResponse(entry: PriceEntry): PriceEntryResponseDto {
  return {
    Symbol: entry.symbol,
    Amount: toNumber(entry.amount),
    Type: entry.type,
  };
}
