import { Point, SegmentEvent } from '../src/types/base'
import { ContourPath } from '../src/types/contours'
import { pointKey } from '../src/utils/points'

export const pt = (x: number, y: number): Point => ({ x, y })

export const ev = (level: number, p1: Point, p2: Point): SegmentEvent => ({
  level,
  segment: { p1, p2 }
})

// Directed point-to-point steps along each path, sorted for comparison.
export function edgesOf(paths: Point[][]): string[] {
  const edges: string[] = []
  for (const points of paths) {
    for (let i = 0; i < points.length - 1; i++) {
      edges.push(`${pointKey(points[i])}>${pointKey(points[i + 1])}`)
    }
  }
  return edges.sort()
}

// One entry per path: its kind and its undirected edges. Independent of where a
// loop starts and of which way a path runs.
export function shapeOf(paths: ContourPath[]): string[] {
  return paths
    .map(({ closed, points }) => {
      const edges: string[] = []
      for (let i = 0; i < points.length - 1; i++) {
        edges.push([pointKey(points[i]), pointKey(points[i + 1])].sort().join('|'))
      }
      return `${closed ? 'loop' : 'chain'} ${edges.sort().join(' ')}`
    })
    .sort()
}

export function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items]
  const out: T[][] = []
  items.forEach((item, i) => {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)]
    for (const tail of permutations(rest)) {
      out.push([item, ...tail])
    }
  })
  return out
}

// Deterministic shuffle from a 32-bit linear congruential generator.
export function shuffled<T>(items: T[], seed: number): T[] {
  const out = [...items]
  let state = seed >>> 0
  for (let i = out.length - 1; i > 0; i--) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    const j = state % (i + 1)
    const held = out[i]
    out[i] = out[j]
    out[j] = held
  }
  return out
}

export const flipped = (event: SegmentEvent): SegmentEvent => ({
  ...event,
  segment: { p1: event.segment.p2, p2: event.segment.p1 }
})
