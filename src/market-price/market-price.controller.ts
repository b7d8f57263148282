import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { MarketPricesQueryDto } from './dto/market-prices-query.dto';
import { MarketPricesResponseDto } from './dto/market-prices-response.dto';

@Controller('market-prices')
export class MarketPriceController {
  constructor(private readonly marketPriceService: MarketPriceService) {}

  /**
   * Returns current mid prices with the fetch timestamp.
   *
   * GET /market-prices?coin=BTC
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async getMarketPrices(@Query() query: MarketPricesQueryDto): Promise<MarketPricesResponseDto> {
    const data = await this.marketPriceService.getMarketPrices(query.coin);
    return {
      prices: data.prices,
      lastUpdated: data.fetchedAt.toISOString(),
      source: 'hyperliquid',
    };
  }
}
