import { CycleGraph } from './cycle_graph'

// A strongly connected component with its least vertex and the edges that
// stay inside it.
interface Component {
  least: number
  adjacency: Map<number, number[]>
}

// One pending visit on an explicit depth-first stack.
interface Frame {
  node: number
  successors: number[]
  next: number
}

/**
 * Finds every elementary cycle of the graph using Johnson's algorithm
 * ("Finding all the elementary circuits of a directed graph", SIAM J. Comput.
 * 4(1), 1975). Each cycle is returned as node indices with its start repeated
 * at the end, e.g. [3, 4, 5, 3].
 *
 * Both searches run on explicit stacks: contour graphs can be tens of
 * thousands of nodes deep.
 */
export function elementaryCycles(graph: CycleGraph): number[][] {
  const cycles: number[][] = []

  let s = 0
  while (s < graph.order - 1) {
    const component = leastComponent(graph, s)
    if (!component) break
    s = component.least
    searchCircuits(component, cycles)
    s++
  }

  return cycles
}

// The component holding the least vertex among the non-trivial strongly
// connected components of the subgraph induced by nodes >= from.
function leastComponent(graph: CycleGraph, from: number): Component | undefined {
  let best: number[] | undefined
  for (const members of stronglyConnectedComponents(graph, from)) {
    if (members.length < 2) continue
    if (!best || leastOf(members) < leastOf(best)) {
      best = members
    }
  }
  if (!best) return undefined

  const inside = new Set(best)
  const adjacency = new Map<number, number[]>()
  for (const u of best) {
    adjacency.set(u, graph.successors(u).filter((v) => inside.has(v)))
  }
  return { least: leastOf(best), adjacency }
}

function leastOf(nodes: number[]): number {
  return nodes.reduce((a, b) => Math.min(a, b))
}

// Tarjan's algorithm restricted to nodes >= from.
function stronglyConnectedComponents(graph: CycleGraph, from: number): number[][] {
  const indices = new Array<number>(graph.order).fill(-1)
  const lowlink = new Array<number>(graph.order).fill(0)
  const onStack = new Array<boolean>(graph.order).fill(false)
  const stack: number[] = []
  const components: number[][] = []
  let index = 0

  const frames: Frame[] = []
  const enter = (v: number): void => {
    indices[v] = index
    lowlink[v] = index
    index++
    stack.push(v)
    onStack[v] = true
    frames.push({ node: v, successors: graph.successors(v), next: 0 })
  }

  for (let root = from; root < graph.order; root++) {
    if (indices[root] !== -1 || graph.successors(root).length === 0) continue
    enter(root)

    while (frames.length > 0) {
      const frame = frames[frames.length - 1]
      const v = frame.node

      if (frame.next < frame.successors.length) {
        const w = frame.successors[frame.next++]
        if (w < from) continue
        if (indices[w] === -1) {
          enter(w)
        } else if (onStack[w]) {
          lowlink[v] = Math.min(lowlink[v], indices[w])
        }
        continue
      }

      frames.pop()
      const parent = frames[frames.length - 1]
      if (parent) {
        lowlink[parent.node] = Math.min(lowlink[parent.node], lowlink[v])
      }

      if (lowlink[v] === indices[v]) {
        const members: number[] = []
        let w = stack.pop()
        while (w !== undefined) {
          onStack[w] = false
          members.push(w)
          if (w === v) break
          w = stack.pop()
        }
        components.push(members)
      }
    }
  }

  return components
}

function searchCircuits(component: Component, cycles: number[][]): void {
  const s = component.least
  const blocked = new Set<number>()
  // Johnson's B-lists: who to unblock once a node is unblocked.
  const blockedBy = new Map<number, Set<number>>()
  const path: number[] = []
  const frames: (Frame & { found: boolean })[] = []

  const unblock = (u: number): void => {
    const pending = [u]
    let node = pending.pop()
    while (node !== undefined) {
      blocked.delete(node)
      const waiting = blockedBy.get(node)
      if (waiting) {
        for (const w of waiting) {
          if (blocked.has(w)) {
            pending.push(w)
          }
        }
        waiting.clear()
      }
      node = pending.pop()
    }
  }

  const enter = (v: number): void => {
    path.push(v)
    blocked.add(v)
    frames.push({ node: v, successors: component.adjacency.get(v) ?? [], next: 0, found: false })
  }

  enter(s)
  while (frames.length > 0) {
    const frame = frames[frames.length - 1]

    if (frame.next < frame.successors.length) {
      const w = frame.successors[frame.next++]
      if (w === s) {
        cycles.push([...path, s])
        frame.found = true
      } else if (!blocked.has(w)) {
        enter(w)
      }
      continue
    }

    const v = frame.node
    if (frame.found) {
      unblock(v)
    } else {
      for (const w of frame.successors) {
        let waiting = blockedBy.get(w)
        if (!waiting) {
          waiting = new Set<number>()
          blockedBy.set(w, waiting)
        }
        waiting.add(v)
      }
    }

    path.pop()
    frames.pop()
    const parent = frames[frames.length - 1]
    if (parent && frame.found) {
      parent.found = true
    }
  }
}
