import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { AppController } from './app.controller';
import { IngestionModule } from './ingestion/ingestion.module';
import { TimelineModule } from './timeline/timeline.module';
import { PnlModule } from './pnl/pnl.module';
import { MarketPriceModule } from './market-price/market-price.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration] }),
    IngestionModule,     // /fills, /funding
    TimelineModule,      // /timeline
    PnlModule,           // /pnl, /pnl/daily
    MarketPriceModule,   // /market-prices
  ],
  controllers: [AppController],
})
export class AppModule {}
