import { Module } from '@nestjs/common';
import { PricesController } from './prices.controller';
import { PricesService } from './prices.service';
import { PriceStoreService } from './price-store.service';

@Module({
  controllers: [PricesController],
  providers: [
    PriceStoreService, // Owns the price book
    PricesService,     // Registry check + writes
  ],
  exports: [PriceStoreService, PricesService],
})
export class PricesModule {}
