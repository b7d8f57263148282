import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { TimelineModule } from '../timeline/timeline.module';
import { PnlController } from './pnl.controller';
import { PnlCalculatorService } from './pnl-calculator.service';

@Module({
  imports: [IngestionModule, TimelineModule],
  controllers: [PnlController],
  providers: [PnlCalculatorService],
})
export class PnlModule {}
