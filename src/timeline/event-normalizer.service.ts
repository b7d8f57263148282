import { Injectable } from '@nestjs/common';
import { FillEvent, FundingEvent, TimelineEventType } from './entities/timeline-event.entity';
import { parseDecimal, ZERO } from '../common/utils/decimal.util';
import { fromEpochMillis } from '../common/utils/date.util';
import { isRecord, readString } from '../common/utils/record.util';

// Turns raw userFills / userFunding records into typed timeline events.
// A record missing a required field yields nothing; optional fields fall
// back to zero or undefined.
@Injectable()
export class EventNormalizerService {
  /**
   * Required: time, coin, side, sz, px.
   * fee defaults to zero; closedPnl and hash are optional.
   */
  normalizeFill(raw: unknown): FillEvent | undefined {
    if (!isRecord(raw)) {
      return undefined;
    }

    const timestamp = fromEpochMillis(raw.time);
    const coin = readString(raw, 'coin');
    const side = readString(raw, 'side');
    const size = parseDecimal(raw.sz);
    const price = parseDecimal(raw.px);

    if (!timestamp || !coin || side === undefined || !size || !price) {
      return undefined;
    }

    return {
      eventType: TimelineEventType.FILL,
      timestamp,
      coin,
      side,
      size,
      price,
      fee: parseDecimal(raw.fee) ?? ZERO,
      realizedPnl: parseDecimal(raw.closedPnl),
      txHash: readString(raw, 'hash'),
    };
  }

  /**
   * Required: time, coin, usdc. fundingRate defaults to zero.
   */
  normalizeFunding(raw: unknown): FundingEvent | undefined {
    if (!isRecord(raw)) {
      return undefined;
    }

    const timestamp = fromEpochMillis(raw.time);
    const coin = readString(raw, 'coin');
    const amount = parseDecimal(raw.usdc);

    if (!timestamp || !coin || !amount) {
      return undefined;
    }

    return {
      eventType: TimelineEventType.FUNDING,
      timestamp,
      coin,
      amount,
      fundingRate: parseDecimal(raw.fundingRate) ?? ZERO,
    };
  }
}
