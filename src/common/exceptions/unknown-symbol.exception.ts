import { NotFoundException } from '@nestjs/common';

// Well-formed symbol that is not in the registry.
export class UnknownSymbolException extends NotFoundException {
  constructor(readonly symbol: string) {
    super(`Unknown symbol: ${symbol}`);
  }
}
