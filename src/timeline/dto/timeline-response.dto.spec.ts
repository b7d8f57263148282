import { toTimelineEventDto } from './timeline-response.dto';
import { TimelineEventType } from '../entities/timeline-event.entity';
import { toDecimal } from '../../common/utils/decimal.util';

describe('toTimelineEventDto', () => {
  const timestamp = new Date('2024-06-01T12:00:00.000Z');

  it('should serialize liquidations with the loss', () => {
    expect(
      toTimelineEventDto({
        eventType: TimelineEventType.LIQUIDATION,
        timestamp,
        coin: 'ETH',
        size: toDecimal('2.5'),
        price: toDecimal('2800'),
        loss: toDecimal('312.75'),
      }),
    ).toEqual({
      eventType: 'liquidation',
      timestamp: '2024-06-01T12:00:00.000Z',
      coin: 'ETH',
      size: '2.5',
      price: '2800',
      loss: '312.75',
    });
  });

  it('should serialize deposits and withdrawals with their token', () => {
    expect(
      toTimelineEventDto({
        eventType: TimelineEventType.WITHDRAWAL,
        timestamp,
        amount: toDecimal('100.000001'),
        token: 'USDC',
      }),
    ).toEqual({
      eventType: 'withdrawal',
      timestamp: '2024-06-01T12:00:00.000Z',
      amount: '100.000001',
      token: 'USDC',
    });
  });

  it('should keep small decimals out of exponent notation', () => {
    const dto = toTimelineEventDto({
      eventType: TimelineEventType.FUNDING,
      timestamp,
      coin: 'BTC',
      amount: toDecimal('-0.0000001'),
      fundingRate: toDecimal('1.25e-8'),
    });

    expect(dto).toEqual({
      eventType: 'funding',
      timestamp: '2024-06-01T12:00:00.000Z',
      coin: 'BTC',
      amount: '-0.0000001',
      fundingRate: '0.0000000125',
    });
  });
});
