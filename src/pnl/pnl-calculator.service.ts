import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Timeline } from '../timeline/entities/timeline.entity';
import { TimelineEvent, TimelineEventType } from '../timeline/entities/timeline-event.entity';
import { AssetPnl, DailyPnl, PnlSummary } from './entities/pnl-summary.entity';
import { add, parseDecimal, subtract, ZERO } from '../common/utils/decimal.util';
import { toDateKey } from '../common/utils/date.util';
import { isRecord } from '../common/utils/record.util';

// Read-only PnL aggregation over a timeline.
// Every function is total: bad or empty input gives zeros, never an error.
@Injectable()
export class PnlCalculatorService {
  /**
   * Sums assetPositions[*].position.unrealizedPnl from a clearinghouse
   * snapshot. Entries without a parsable value contribute zero.
   */
  calculateUnrealizedFromState(userState: unknown): Decimal {
    if (!isRecord(userState) || !Array.isArray(userState.assetPositions)) {
      return ZERO;
    }

    return userState.assetPositions.reduce<Decimal>((sum, entry: unknown) => {
      if (!isRecord(entry) || !isRecord(entry.position)) {
        return sum;
      }
      const pnl = parseDecimal(entry.position.unrealizedPnl);
      return pnl ? sum.plus(pnl) : sum;
    }, ZERO);
  }

  /**
   * Single pass over the timeline.
   * Fill: fee always counts, realized PnL only when present.
   * Funding: amount per coin. Other variants don't contribute.
   */
  calculateSummary(wallet: string, timeline: Timeline, unrealizedPnl: Decimal): PnlSummary {
    let realizedPnl = ZERO;
    let fundingPnl = ZERO;
    let tradingFees = ZERO;
    const byAsset = new Map<string, AssetPnl>();

    for (const event of timeline.events) {
      switch (event.eventType) {
        case TimelineEventType.FILL: {
          const asset = this.getOrCreateAsset(byAsset, event.coin);
          tradingFees = tradingFees.plus(event.fee);
          asset.fees = asset.fees.plus(event.fee);
          asset.tradeCount += 1;

          if (event.realizedPnl) {
            realizedPnl = realizedPnl.plus(event.realizedPnl);
            asset.realizedPnl = asset.realizedPnl.plus(event.realizedPnl);
          }
          break;
        }
        case TimelineEventType.FUNDING: {
          const asset = this.getOrCreateAsset(byAsset, event.coin);
          fundingPnl = fundingPnl.plus(event.amount);
          asset.fundingPnl = asset.fundingPnl.plus(event.amount);
          break;
        }
        default:
          break;
      }
    }

    for (const asset of byAsset.values()) {
      asset.netPnl = subtract(add(asset.realizedPnl, asset.fundingPnl), asset.fees);
    }

    const totalPnl = add(realizedPnl, unrealizedPnl);
    const netPnl = subtract(add(totalPnl, fundingPnl), tradingFees);

    // empty timeline -> zero-width period at "now"
    const now = new Date();

    return {
      wallet,
      periodStart: timeline.fromTimestamp ?? now,
      periodEnd: timeline.toTimestamp ?? now,
      realizedPnl,
      unrealizedPnl,
      totalPnl,
      fundingPnl,
      tradingFees,
      netPnl,
      byAsset,
    };
  }

  /**
   * Buckets events by UTC date and carries a running total across days.
   * Date keys are YYYY-MM-DD, so string order is chronological order.
   */
  calculateDaily(timeline: Timeline): DailyPnl[] {
    const dailyTotals = new Map<string, Decimal>();

    for (const event of timeline.events) {
      const date = toDateKey(event.timestamp);
      const current = dailyTotals.get(date) ?? ZERO;
      dailyTotals.set(date, current.plus(this.dailyContribution(event)));
    }

    const dates = Array.from(dailyTotals.keys()).sort();

    let cumulative = ZERO;
    return dates.map((date) => {
      const pnl = dailyTotals.get(date) ?? ZERO;
      cumulative = cumulative.plus(pnl);
      return { date, pnl, cumulativePnl: cumulative };
    });
  }

  private dailyContribution(event: TimelineEvent): Decimal {
    switch (event.eventType) {
      case TimelineEventType.FILL:
        return (event.realizedPnl ?? ZERO).minus(event.fee);
      case TimelineEventType.FUNDING:
        return event.amount;
      case TimelineEventType.LIQUIDATION:
        return event.loss.negated();
      default:
        return ZERO;
    }
  }

  private getOrCreateAsset(byAsset: Map<string, AssetPnl>, coin: string): AssetPnl {
    let asset = byAsset.get(coin);
    if (!asset) {
      asset = {
        coin,
        realizedPnl: ZERO,
        fundingPnl: ZERO,
        fees: ZERO,
        netPnl: ZERO,
        tradeCount: 0,
      };
      byAsset.set(coin, asset);
    }
    return asset;
  }
}
