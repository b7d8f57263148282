import { TimelineEvent } from './timeline-event.entity';

// Chronological account activity for one wallet.
// Built fresh per request and never mutated afterwards.
export interface Timeline {
  readonly wallet: string;
  readonly events: readonly TimelineEvent[];   // ascending by timestamp, stable
  readonly fromTimestamp?: Date;               // absent when events is empty
  readonly toTimestamp?: Date;
}
