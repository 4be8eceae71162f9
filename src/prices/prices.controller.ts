import {
  All,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  MethodNotAllowedException,
  Post,
} from '@nestjs/common';
import { PricesService } from './prices.service';
import { SetPriceDto } from './dto/set-price.dto';
import { PriceEntryResponseDto, toPriceEntryResponse } from './dto/price-entry-response.dto';

@Controller()
export class PricesController {
  constructor(private readonly pricesService: PricesService) {}

  /**
   * Returns every current price; empty array before anything is set.
   *
   * GET /prices
   */
  @Get('prices')
  @HttpCode(HttpStatus.OK)
  getPrices(): PriceEntryResponseDto[] {
    return this.pricesService.listPrices().map(toPriceEntryResponse);
  }

  /**
   * Sets the price of a registered symbol in one currency.
   * Overwrites any previous amount for the same pair.
   *
   * POST /set-price
   * @returns 200 with the stored entry, 400 on invalid input, 404 on unknown symbol
   */
  @Post('set-price')
  @HttpCode(HttpStatus.OK)
  setPrice(@Body() setPriceDto: SetPriceDto): PriceEntryResponseDto {
    return toPriceEntryResponse(this.pricesService.setPrice(setPriceDto));
  }

  @All('set-price')
  rejectSetPriceMethod(): never {
    throw new MethodNotAllowedException('Method not allowed');
  }
}
