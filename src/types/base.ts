export type Point = {
  x: number
  y: number
}

// A single piece of an iso-line inside one grid cell. Endpoints are unordered.
export type Segment = {
  p1: Point
  p2: Point
}

// Grid cell the segment generator was scanning. Passed through untouched.
export type GridCell = {
  i: number
  j: number
}

export type SegmentEvent = {
  level: number
  segment: Segment
  cell?: GridCell
}
