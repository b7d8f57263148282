import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { IngestionService } from '../ingestion/ingestion.service';
import { TimelineService } from '../timeline/timeline.service';
import { PnlCalculatorService } from './pnl-calculator.service';
import { WalletQueryDto } from '../common/dto/wallet-query.dto';
import {
  DailyPnlResponseDto,
  PnlSummaryResponseDto,
  toDailyPnlResponse,
  toPnlSummaryResponse,
} from './dto/pnl-response.dto';

@Controller('pnl')
export class PnlController {
  constructor(
    private readonly ingestionService: IngestionService,
    private readonly timelineService: TimelineService,
    private readonly pnlCalculator: PnlCalculatorService,
  ) {}

  /**
   * Realized, unrealized, funding and fee totals with a per-coin breakdown.
   * Unrealized PnL comes from the live clearinghouse snapshot.
   *
   * GET /pnl?wallet=0x...&since=1700000000000
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async getPnlSummary(@Query() query: WalletQueryDto): Promise<PnlSummaryResponseDto> {
    const [activity, userState] = await Promise.all([
      this.ingestionService.fetchActivity(query.wallet, query.since),
      this.ingestionService.fetchUserState(query.wallet),
    ]);

    const timeline = this.timelineService.buildTimeline(query.wallet, activity.fills, activity.funding);
    const unrealizedPnl = this.pnlCalculator.calculateUnrealizedFromState(userState);
    const summary = this.pnlCalculator.calculateSummary(query.wallet, timeline, unrealizedPnl);

    return toPnlSummaryResponse(summary);
  }

  /**
   * Net PnL per UTC day with a running cumulative total.
   *
   * GET /pnl/daily?wallet=0x...&since=1700000000000
   */
  @Get('daily')
  @HttpCode(HttpStatus.OK)
  async getDailyPnl(@Query() query: WalletQueryDto): Promise<DailyPnlResponseDto[]> {
    const { fills, funding } = await this.ingestionService.fetchActivity(query.wallet, query.since);
    const timeline = this.timelineService.buildTimeline(query.wallet, fills, funding);
    return toDailyPnlResponse(this.pnlCalculator.calculateDaily(timeline));
  }
}
