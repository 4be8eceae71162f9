import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { PriceStoreService } from './prices/price-store.service';
import { PriceFeedService } from './price-feed/price-feed.service';

@Controller()
export class AppController {
  constructor(
    private readonly priceStore: PriceStoreService,
    private readonly priceFeed: PriceFeedService,
  ) {}

  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'price-feed',
      prices: this.priceStore.size(),
      feed: this.priceFeed.isRunning() ? 'running' : 'disabled',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Price Feed API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        prices: '/prices',
        setPrice: '/set-price',
      },
    };
  }
}
