import { SegmentEvent } from './base'

// A segment event stream read from disk, optionally with the levels it was cut at.
export type EventStream = {
  levels?: number[] // Ascending, without duplicates.
  events: SegmentEvent[]
}
