import { Point } from '../types/base'
import { pointKey } from '../utils/points'
import { InternalConsistencyError } from './errors'

/**
 * Directed multigraph over one contour's flattened points.
 *
 * Node `i` stands for the first occurrence of `points[i]`; later visits to the
 * same point fold onto that node, which is what turns a self-crossing path into
 * a graph cycle. Indices of repeat occurrences are present but never carry
 * edges. A step the path takes more than once is one edge with a count.
 */
export class CycleGraph {
  private readonly adjacency: Map<number, number>[]

  constructor(public readonly points: Point[]) {
    const firstSeen = new Map<string, number>()
    points.forEach((p, i) => {
      const key = pointKey(p)
      if (!firstSeen.has(key)) {
        firstSeen.set(key, i)
      }
    })
    const nodeOf = (i: number): number => firstSeen.get(pointKey(points[i])) ?? i

    this.adjacency = points.map(() => new Map<number, number>())
    for (let i = 0; i < points.length - 1; i++) {
      const out = this.adjacency[nodeOf(i)]
      const v = nodeOf(i + 1)
      out.set(v, (out.get(v) ?? 0) + 1)
    }
  }

  public get order(): number {
    return this.adjacency.length
  }

  // Distinct successors of u that still have an edge left.
  public successors(u: number): number[] {
    return [...this.adjacency[u].keys()]
  }

  public edgeCount(): number {
    let count = 0
    for (const out of this.adjacency) {
      for (const n of out.values()) {
        count += n
      }
    }
    return count
  }

  /**
   * Consumes one copy of every edge of a node path, e.g. [s, a, b, s]. Nothing
   * is consumed, and false returned, when any of its edges is already used up.
   */
  public take(path: number[]): boolean {
    for (let i = 0; i < path.length - 1; i++) {
      if (!this.adjacency[path[i]].has(path[i + 1])) {
        return false
      }
    }
    for (let i = 0; i < path.length - 1; i++) {
      this.consume(path[i], path[i + 1])
    }
    return true
  }

  private consume(u: number, v: number): void {
    const out = this.adjacency[u]
    const n = out.get(v) ?? 0
    if (n > 1) {
      out.set(v, n - 1)
    } else {
      out.delete(v)
    }
  }

  /**
   * Walks what is left as simple chains, consuming the edges as it goes.
   * Every node must have in- and out-degree of at most one; anything else is
   * a branching structure this graph cannot have come from.
   */
  public linearPaths(): Point[][] {
    const inDegree = new Array<number>(this.order).fill(0)
    this.adjacency.forEach((out, u) => {
      let outDegree = 0
      for (const [v, n] of out) {
        outDegree += n
        inDegree[v] += n
      }
      if (outDegree > 1) {
        throw new InternalConsistencyError(`Contour graph node ${u} branches after loop removal`)
      }
    })
    inDegree.forEach((degree, v) => {
      if (degree > 1) {
        throw new InternalConsistencyError(`Contour graph node ${v} merges after loop removal`)
      }
    })

    const chains: Point[][] = []
    for (let start = 0; start < this.order; start++) {
      if (inDegree[start] !== 0 || this.adjacency[start].size === 0) continue

      const chain: Point[] = [this.points[start]]
      let next = this.takeNext(start)
      while (next !== undefined) {
        chain.push(this.points[next])
        next = this.takeNext(next)
      }
      chains.push(chain)
    }

    if (this.edgeCount() > 0) {
      throw new InternalConsistencyError('Contour graph still holds a cycle after loop removal')
    }
    return chains
  }

  // Removes and returns the single outgoing edge of u, if any.
  private takeNext(u: number): number | undefined {
    for (const v of this.adjacency[u].keys()) {
      this.consume(u, v)
      return v
    }
    return undefined
  }
}
