import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { TimelineService } from './timeline.service';
import { IngestionService } from '../ingestion/ingestion.service';
import { WalletQueryDto } from '../common/dto/wallet-query.dto';
import { TimelineResponseDto, toTimelineResponse } from './dto/timeline-response.dto';

@Controller('timeline')
export class TimelineController {
  constructor(
    private readonly ingestionService: IngestionService,
    private readonly timelineService: TimelineService,
  ) {}

  /**
   * Chronological fills and funding for a wallet.
   *
   * GET /timeline?wallet=0x...&since=1700000000000
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async getTimeline(@Query() query: WalletQueryDto): Promise<TimelineResponseDto> {
    const { fills, funding } = await this.ingestionService.fetchActivity(query.wallet, query.since);
    const timeline = this.timelineService.buildTimeline(query.wallet, fills, funding);
    return toTimelineResponse(timeline);
  }
}
