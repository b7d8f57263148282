import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { TimelineController } from './timeline.controller';
import { TimelineService } from './timeline.service';
import { EventNormalizerService } from './event-normalizer.service';

@Module({
  imports: [IngestionModule],
  controllers: [TimelineController],
  providers: [EventNormalizerService, TimelineService],
  exports: [TimelineService],
})
export class TimelineModule {}
