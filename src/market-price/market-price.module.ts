import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { MarketPriceController } from './market-price.controller';
import { MarketPriceService } from './market-price.service';

@Module({
  imports: [IngestionModule],
  controllers: [MarketPriceController],
  providers: [MarketPriceService],
})
export class MarketPriceModule {}
