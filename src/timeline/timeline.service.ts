import { Injectable, Logger } from '@nestjs/common';
import { EventNormalizerService } from './event-normalizer.service';
import { Timeline } from './entities/timeline.entity';
import { TimelineEvent } from './entities/timeline-event.entity';

// Merges normalized fills and funding into one chronological sequence.
// Never throws: malformed input only shrinks the timeline.
@Injectable()
export class TimelineService {
  private readonly logger = new Logger(TimelineService.name);

  constructor(private readonly normalizer: EventNormalizerService) {}

  /**
   * Normalizes every fill, then every funding record, and sorts the result
   * by timestamp. Array.prototype.sort is stable, so equal timestamps keep
   * input order (fills ahead of funding).
   */
  buildTimeline(wallet: string, rawFills: unknown[], rawFunding: unknown[]): Timeline {
    const events: TimelineEvent[] = [];

    for (const raw of rawFills) {
      const event = this.normalizer.normalizeFill(raw);
      if (event) {
        events.push(event);
      }
    }
    const fillCount = events.length;

    for (const raw of rawFunding) {
      const event = this.normalizer.normalizeFunding(raw);
      if (event) {
        events.push(event);
      }
    }
    const fundingCount = events.length - fillCount;

    const dropped = rawFills.length - fillCount + (rawFunding.length - fundingCount);
    if (dropped > 0) {
      this.logger.debug(`Dropped ${dropped} malformed records for ${wallet}`);
    }

    events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    return {
      wallet,
      events,
      fromTimestamp: events.length > 0 ? events[0].timestamp : undefined,
      toTimestamp: events.length > 0 ? events[events.length - 1].timestamp : undefined,
    };
  }
}
