import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { PricesModule } from './prices/prices.module';
import { PriceFeedModule } from './price-feed/price-feed.module';
import { envValidationSchema } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validationSchema: envValidationSchema,
    }),
    PricesModule,    // GET /prices, POST /set-price
    PriceFeedModule, // Optional upstream polling
  ],
  controllers: [AppController],
})
export class AppModule {}
