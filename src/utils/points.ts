import { Point } from '../types/base'

// Exact identity: adjacent cells interpolate a shared edge to the same value,
// so no tolerance is applied here.
export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y
}

// Number formatting is round-trip exact for finite doubles, and 0 and -0 share a key.
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`
}

export function reversed<T>(items: readonly T[]): T[] {
  const out: T[] = []
  for (let i = items.length - 1; i >= 0; i--) {
    out.push(items[i])
  }
  return out
}

export function countDistinctPoints(points: Point[]): number {
  return new Set(points.map(pointKey)).size
}
