import Decimal from 'decimal.js';

export enum TimelineEventType {
  FILL = 'fill',
  FUNDING = 'funding',
  LIQUIDATION = 'liquidation',
  DEPOSIT = 'deposit',
  WITHDRAWAL = 'withdrawal',
}

// Trade execution normalized from a raw userFills record.
export interface FillEvent {
  readonly eventType: TimelineEventType.FILL;
  readonly timestamp: Date;
  readonly coin: string;
  readonly side: string;               // exchange token, e.g. "B" / "A" or buy / sell
  readonly size: Decimal;
  readonly price: Decimal;
  readonly fee: Decimal;               // zero when the exchange sent none
  readonly realizedPnl?: Decimal;      // closedPnl, only on closing fills
  readonly txHash?: string;
}

// Funding payment; positive amount = received, negative = paid.
export interface FundingEvent {
  readonly eventType: TimelineEventType.FUNDING;
  readonly timestamp: Date;
  readonly coin: string;
  readonly amount: Decimal;
  readonly fundingRate: Decimal;       // informational, never aggregated
}

// The variants below are not produced by the normalizer yet.

export interface LiquidationEvent {
  readonly eventType: TimelineEventType.LIQUIDATION;
  readonly timestamp: Date;
  readonly coin: string;
  readonly size: Decimal;
  readonly price: Decimal;
  readonly loss: Decimal;
}

export interface DepositEvent {
  readonly eventType: TimelineEventType.DEPOSIT;
  readonly timestamp: Date;
  readonly amount: Decimal;
  readonly token: string;
}

export interface WithdrawalEvent {
  readonly eventType: TimelineEventType.WITHDRAWAL;
  readonly timestamp: Date;
  readonly amount: Decimal;
  readonly token: string;
}

export type TimelineEvent =
  | FillEvent
  | FundingEvent
  | LiquidationEvent
  | DepositEvent
  | WithdrawalEvent;
