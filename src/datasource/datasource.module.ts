import { Module } from '@nestjs/common';
import { DATA_SOURCE } from './datasource.interface';
import { HyperliquidInfoClient } from './hyperliquid-info.client';

@Module({
  providers: [{ provide: DATA_SOURCE, useClass: HyperliquidInfoClient }],
  exports: [DATA_SOURCE],
})
export class DataSourceModule {}
