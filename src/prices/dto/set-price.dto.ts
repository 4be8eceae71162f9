import { Transform } from 'class-transformer';
import { IsDefined, IsEnum, IsNotEmpty, IsNumber, IsPositive, IsString } from 'class-validator';
import { CurrencyType } from '../entities/price-entry.entity';

const DECIMAL_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Plain decimal strings ("100", "0.5", "1e-9") become numbers; anything else
// ("0x10", "Infinity") is left for IsNumber to reject.
function parseAmount(value: unknown): unknown {
  if (typeof value === 'string' && DECIMAL_STRING.test(value.trim())) {
    return Number(value);
  }
  return value;
}

// Manual price update. Symbol registry is checked by the service, not here.
export class SetPriceDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsDefined()
  @Transform(({ value }) => parseAmount(value))
  @IsNumber()
  @IsPositive()
  amount!: number;

  @IsDefined()
  @IsEnum(CurrencyType)
  type!: CurrencyType;
}
