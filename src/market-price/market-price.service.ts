import { Injectable } from '@nestjs/common';
import { IngestionService } from '../ingestion/ingestion.service';
import { parseDecimal, toPlainString } from '../common/utils/decimal.util';
import { isRecord } from '../common/utils/record.util';

export interface MarketPrices {
  prices: Record<string, string>;
  fetchedAt: Date;
}

/**
 * Current mid prices from the exchange (allMids).
 * Informational only: unrealized PnL is taken from the clearinghouse
 * snapshot, never recomputed from these.
 */
@Injectable()
export class MarketPriceService {
  constructor(private readonly ingestionService: IngestionService) {}

  /** Fetches all mids, optionally narrowed to one coin. Unparsable prices are skipped. */
  async getMarketPrices(coin?: string): Promise<MarketPrices> {
    const mids = await this.ingestionService.fetchAllMids();
    const fetchedAt = new Date();

    return { prices: this.parseMids(mids, coin), fetchedAt };
  }

  private parseMids(mids: unknown, coin?: string): Record<string, string> {
    if (!isRecord(mids)) {
      return {};
    }

    const entries: [string, string][] = [];
    Object.entries(mids).forEach(([symbol, raw]) => {
      if (coin !== undefined && symbol !== coin) {
        return;
      }
      const price = parseDecimal(raw);
      if (price) {
        entries.push([symbol, toPlainString(price)]);
      }
    });
    return Object.fromEntries(entries);
  }
}
