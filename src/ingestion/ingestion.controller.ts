import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { WalletQueryDto } from '../common/dto/wallet-query.dto';

// Raw upstream records, passed through untouched.
@Controller()
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * GET /fills?wallet=0x...&since=1700000000000
   */
  @Get('fills')
  @HttpCode(HttpStatus.OK)
  getFills(@Query() query: WalletQueryDto): Promise<unknown[]> {
    return this.ingestionService.fetchAllFills(query.wallet, query.since);
  }

  /**
   * GET /funding?wallet=0x...&since=1700000000000
   */
  @Get('funding')
  @HttpCode(HttpStatus.OK)
  getFunding(@Query() query: WalletQueryDto): Promise<unknown[]> {
    return this.ingestionService.fetchAllFunding(query.wallet, query.since);
  }
}
