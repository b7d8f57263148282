import { AssetPnl, DailyPnl, PnlSummary } from '../entities/pnl-summary.entity';
import { toPlainString } from '../../common/utils/decimal.util';

// Per-coin realized, funding and fees
export interface AssetPnlDto {
  coin: string;
  realizedPnl: string;
  fundingPnl: string;
  fees: string;
  netPnl: string;                  // realized + funding - fees
  tradeCount: number;
}

// Complete PnL breakdown for the period covered by the timeline
export interface PnlSummaryResponseDto {
  wallet: string;
  periodStart: string;             // ISO timestamp
  periodEnd: string;
  realizedPnl: string;
  unrealizedPnl: string;           // exchange-reported, open positions
  totalPnl: string;                // realized + unrealized
  fundingPnl: string;
  tradingFees: string;
  netPnl: string;                  // total + funding - fees
  byAsset: Record<string, AssetPnlDto>;
}

export interface DailyPnlResponseDto {
  date: string;                    // YYYY-MM-DD (UTC)
  pnl: string;
  cumulativePnl: string;
}

export function toAssetPnlDto(asset: AssetPnl): AssetPnlDto {
  return {
    coin: asset.coin,
    realizedPnl: toPlainString(asset.realizedPnl),
    fundingPnl: toPlainString(asset.fundingPnl),
    fees: toPlainString(asset.fees),
    netPnl: toPlainString(asset.netPnl),
    tradeCount: asset.tradeCount,
  };
}

export function toPnlSummaryResponse(summary: PnlSummary): PnlSummaryResponseDto {
  // fromEntries defines own keys, so a coin such as "__proto__" survives
  const byAsset: Record<string, AssetPnlDto> = Object.fromEntries(
    Array.from(summary.byAsset, ([coin, asset]): [string, AssetPnlDto] => [coin, toAssetPnlDto(asset)]),
  );

  return {
    wallet: summary.wallet,
    periodStart: summary.periodStart.toISOString(),
    periodEnd: summary.periodEnd.toISOString(),
    realizedPnl: toPlainString(summary.realizedPnl),
    unrealizedPnl: toPlainString(summary.unrealizedPnl),
    totalPnl: toPlainString(summary.totalPnl),
    fundingPnl: toPlainString(summary.fundingPnl),
    tradingFees: toPlainString(summary.tradingFees),
    netPnl: toPlainString(summary.netPnl),
    byAsset,
  };
}

export function toDailyPnlResponse(daily: DailyPnl[]): DailyPnlResponseDto[] {
  return daily.map((day) => ({
    date: day.date,
    pnl: toPlainString(day.pnl),
    cumulativePnl: toPlainString(day.cumulativePnl),
  }));
}
