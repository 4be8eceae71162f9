import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { PriceFeedService } from './price-feed.service';
import { CoingeckoProvider } from './providers/coingecko.provider';
import { PRICE_PROVIDER } from './price-provider.interface';

@Module({
  imports: [PricesModule],
  providers: [
    CoingeckoProvider,
    { provide: PRICE_PROVIDER, useExisting: CoingeckoProvider },
    PriceFeedService,
  ],
  exports: [PriceFeedService],
})
export class PriceFeedModule {}
