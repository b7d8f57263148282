import Decimal from 'decimal.js';

// Per-coin breakdown. Created lazily the first time an event names the coin.
export interface AssetPnl {
  coin: string;
  realizedPnl: Decimal;
  fundingPnl: Decimal;
  fees: Decimal;
  netPnl: Decimal;          // realized + funding - fees
  tradeCount: number;
}

export interface PnlSummary {
  wallet: string;
  periodStart: Date;
  periodEnd: Date;
  realizedPnl: Decimal;
  unrealizedPnl: Decimal;   // exchange-reported, not derived from fills
  totalPnl: Decimal;        // realized + unrealized
  fundingPnl: Decimal;
  tradingFees: Decimal;
  netPnl: Decimal;          // total + funding - fees
  byAsset: Map<string, AssetPnl>;
}

// One UTC calendar day with at least one event.
export interface DailyPnl {
  date: string;             // YYYY-MM-DD
  pnl: Decimal;
  cumulativePnl: Decimal;
}
