import { Point } from '../types/base'
import { pointKey, pointsEqual } from '../utils/points'
import { Contour } from './contour'
import { CycleGraph } from './cycle_graph'
import { elementaryCycles } from './johnson'

/**
 * Counts revisited points along the path. The closing point of a genuine
 * loop (first equals last) is not a revisit.
 */
export function countRepeats(points: Point[]): number {
  const walk = isClosedWalk(points) ? points.slice(0, -1) : points
  const seen = new Set<string>()
  let repeats = 0
  for (const p of walk) {
    const key = pointKey(p)
    if (seen.has(key)) {
      repeats++
    }
    seen.add(key)
  }
  return repeats
}

function isClosedWalk(points: Point[]): boolean {
  return points.length > 1 && pointsEqual(points[0], points[points.length - 1])
}

/**
 * Splits a contour whose path crosses itself into closed loops and the
 * remaining chains. Returns the contours that replace it: the contour itself
 * when there is nothing to excise, otherwise loops first, then chains.
 */
export function exciseLoops(contour: Contour, quick: boolean): Contour[] {
  const points = contour.points()
  const repeats = countRepeats(points)
  if (repeats === 0) {
    return [contour]
  }

  if (quick && repeats === 1) {
    const split = exciseQuick(points, contour.z)
    if (split) {
      return split
    }
  }

  return exciseCycles(points, contour.z) ?? [contour]
}

/**
 * Heuristic single-pass excision: the span between the two visits of the
 * first revisited point becomes a loop and the outer parts are stitched back
 * together. Only correct for a single self-touch. Returns undefined where it
 * does not apply, which is when the revisited point is the path's start or end.
 */
export function exciseQuick(points: Point[], z: number): Contour[] | undefined {
  const limit = isClosedWalk(points) ? points.length - 1 : points.length
  const seen = new Map<string, number>()

  for (let j = 0; j < limit; j++) {
    const p = points[j]
    const i = seen.get(pointKey(p))
    if (i === undefined) {
      seen.set(pointKey(p), j)
      continue
    }
    if (pointsEqual(p, points[0]) || pointsEqual(p, points[points.length - 1])) {
      return undefined
    }

    const loop = Contour.fromPoints(points.slice(i, j + 1), z)
    const rest = Contour.fromPoints([...points.slice(0, i), ...points.slice(j)], z)
    return [loop, rest]
  }

  return undefined
}

/**
 * Full excision: elementary cycles of the path graph become loops for as long
 * as their edges are still unused, and what remains is walked as simple
 * chains. Every edge of the path lands in exactly one output piece. Returns
 * undefined when the graph holds no cycle.
 */
export function exciseCycles(points: Point[], z: number): Contour[] | undefined {
  const graph = new CycleGraph(points)
  const cycles = elementaryCycles(graph)
  if (cycles.length === 0) {
    return undefined
  }

  const loops: Contour[] = []
  for (const cycle of cycles) {
    while (graph.take(cycle)) {
      loops.push(Contour.fromPoints(cycle.map((node) => points[node]), z))
    }
  }

  const chains = graph.linearPaths().map((chain) => Contour.fromPoints(chain, z))

  return [...loops, ...chains]
}
