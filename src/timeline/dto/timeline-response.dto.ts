import { Timeline } from '../entities/timeline.entity';
import { TimelineEvent, TimelineEventType } from '../entities/timeline-event.entity';
import { toPlainString } from '../../common/utils/decimal.util';

// Decimals go out as exact strings, timestamps as ISO-8601.

export interface FillEventDto {
  eventType: TimelineEventType.FILL;
  timestamp: string;
  coin: string;
  side: string;
  size: string;
  price: string;
  fee: string;
  realizedPnl: string | null;
  txHash: string | null;
}

export interface FundingEventDto {
  eventType: TimelineEventType.FUNDING;
  timestamp: string;
  coin: string;
  amount: string;
  fundingRate: string;
}

export interface LiquidationEventDto {
  eventType: TimelineEventType.LIQUIDATION;
  timestamp: string;
  coin: string;
  size: string;
  price: string;
  loss: string;
}

export interface TransferEventDto {
  eventType: TimelineEventType.DEPOSIT | TimelineEventType.WITHDRAWAL;
  timestamp: string;
  amount: string;
  token: string;
}

export type TimelineEventDto =
  | FillEventDto
  | FundingEventDto
  | LiquidationEventDto
  | TransferEventDto;

export interface TimelineResponseDto {
  wallet: string;
  events: TimelineEventDto[];
  fromTimestamp: string | null;
  toTimestamp: string | null;
}

export function toTimelineEventDto(event: TimelineEvent): TimelineEventDto {
  const timestamp = event.timestamp.toISOString();

  switch (event.eventType) {
    case TimelineEventType.FILL:
      return {
        eventType: event.eventType,
        timestamp,
        coin: event.coin,
        side: event.side,
        size: toPlainString(event.size),
        price: toPlainString(event.price),
        fee: toPlainString(event.fee),
        realizedPnl: event.realizedPnl ? toPlainString(event.realizedPnl) : null,
        txHash: event.txHash ?? null,
      };
    case TimelineEventType.FUNDING:
      return {
        eventType: event.eventType,
        timestamp,
        coin: event.coin,
        amount: toPlainString(event.amount),
        fundingRate: toPlainString(event.fundingRate),
      };
    case TimelineEventType.LIQUIDATION:
      return {
        eventType: event.eventType,
        timestamp,
        coin: event.coin,
        size: toPlainString(event.size),
        price: toPlainString(event.price),
        loss: toPlainString(event.loss),
      };
    case TimelineEventType.DEPOSIT:
    case TimelineEventType.WITHDRAWAL:
      return {
        eventType: event.eventType,
        timestamp,
        amount: toPlainString(event.amount),
        token: event.token,
      };
  }
}

export function toTimelineResponse(timeline: Timeline): TimelineResponseDto {
  return {
    wallet: timeline.wallet,
    events: timeline.events.map(toTimelineEventDto),
    fromTimestamp: timeline.fromTimestamp?.toISOString() ?? null,
    toTimestamp: timeline.toTimestamp?.toISOString() ?? null,
  };
}
