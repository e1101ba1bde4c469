import { QUICK_EXCISION } from '../constants'
import { Point, SegmentEvent } from '../types/base'
import { AssemblyOptions, ContourId, ContourPathMap } from '../types/contours'
import { pointKey, pointsEqual } from '../utils/points'
import { Contour } from './contour'
import { ContourSet } from './contour_set'
import { EndpointRegistry } from './endpoint_registry'
import { InternalConsistencyError } from './errors'
import { exciseLoops } from './excision'

// Working state for one iso-level. Never shared between levels.
interface LevelState {
  registry: EndpointRegistry
  contours: ContourSet
  skipped: number // Zero-length segments dropped.
}

/**
 * Builds ordered contour paths from a stream of per-cell segments.
 *
 * Each segment either starts a new contour, extends the contour owning one of
 * its endpoints, closes a contour on itself, or joins two contours into one.
 * Once the stream is drained, `finish` excises loops from self-crossing
 * contours and returns the paths grouped by level.
 */
export class ContourAssembler {
  private readonly levels = new Map<number, LevelState>()
  private readonly quickExcision: boolean
  private finished = false

  constructor(options: AssemblyOptions = {}) {
    this.quickExcision = options.quickExcision ?? QUICK_EXCISION
  }

  public addAll(events: Iterable<SegmentEvent>): void {
    for (const event of events) {
      this.add(event)
    }
  }

  public add(event: SegmentEvent): void {
    if (this.finished) {
      throw new InternalConsistencyError('Cannot add segments after the assembler has finished')
    }

    const { level, segment } = event
    const { p1, p2 } = segment
    const state = this.stateFor(level)
    const { registry, contours } = state

    if (pointsEqual(p1, p2)) {
      state.skipped++
      return
    }

    const id1 = registry.lookup(p1)
    const id2 = registry.lookup(p2)

    if (id1 === undefined) {
      // New segment.
      if (id2 === undefined) {
        const contour = Contour.fromSegment(segment, level)
        contours.add(contour)
        registry.set(p1, contour.id)
        registry.set(p2, contour.id)
        return
      }
      contours.get(id2).extend(segment, registry)
      return
    }

    const first = contours.get(id1)
    first.extend(segment, registry)
    if (id2 === undefined) {
      return
    }

    // Both ends on the same contour: it has just closed on itself. The closing
    // point stays registered so segments crossing there can still attach.
    if (id2 === id1) {
      if (!first.isLoop()) {
        throw new InternalConsistencyError(`Contour ${first.id} met itself without closing`)
      }
      registry.seal(first.front(), first.id)
      return
    }

    first.connect(contours.get(id2), registry)
    contours.delete(id2)
  }

  private stateFor(level: number): LevelState {
    if (!Number.isFinite(level)) {
      throw new InternalConsistencyError(`Level ${level} reached the assembler; filter it first`)
    }
    let state = this.levels.get(level)
    if (!state) {
      state = { registry: new EndpointRegistry(), contours: new ContourSet(), skipped: 0 }
      this.levels.set(level, state)
    }
    return state
  }

  // Segments cross a closing point in pairs. An odd number of segment ends
  // there means a stray segment landed on a closed contour.
  private checkSealedPoints(level: number, state: LevelState): void {
    const { registry, contours } = state
    const ends = new Map<string, { point: Point; closed: ContourId; count: number }>()
    for (const contour of contours.values()) {
      const points = contour.points()
      points.forEach((p, i) => {
        const closed = registry.sealedAt(p)
        if (closed === undefined) return
        const key = pointKey(p)
        const entry = ends.get(key) ?? { point: p, closed, count: 0 }
        entry.count += i === 0 || i === points.length - 1 ? 1 : 2
        ends.set(key, entry)
      })
    }

    for (const { point, closed, count } of ends.values()) {
      if (count % 2 !== 0) {
        throw new InternalConsistencyError(
          `Segment endpoint (${point.x}, ${point.y}) at level ${level} lands on closed contour ` +
            `${closed}: ${count} segment ends meet there`
        )
      }
    }
  }

  // Levels seen so far, ascending.
  public get levelValues(): number[] {
    return [...this.levels.keys()].sort((a, b) => a - b)
  }

  public contoursAt(level: number): Contour[] {
    const state = this.levels.get(level)
    return state ? [...state.contours.values()] : []
  }

  /**
   * Checks that the registry holds exactly the two ends of every open contour
   * and the closing point of every loop at the level, and nothing else, and
   * that no closing point carries an unpaired segment end. Meant for a level
   * whose segments have all arrived, before `finish`.
   */
  public verifyEndpoints(level: number): void {
    if (this.finished) {
      throw new InternalConsistencyError('Open ends are not tracked once the assembler has finished')
    }
    const state = this.levels.get(level)
    if (!state) return
    const { registry, contours } = state

    let openEnds = 0
    for (const contour of contours.values()) {
      const ends = contour.isLoop() ? [contour.front()] : [contour.front(), contour.back()]
      openEnds += ends.length
      for (const end of ends) {
        if (registry.lookup(end) !== contour.id) {
          throw new InternalConsistencyError(
            `Open end (${end.x}, ${end.y}) of contour ${contour.id} is not registered to it`
          )
        }
      }
    }

    for (const [key, id] of registry.entries()) {
      if (!contours.has(id)) {
        throw new InternalConsistencyError(`Open end ${key} belongs to unknown contour ${id}`)
      }
      const contour = contours.get(id)
      if (key !== pointKey(contour.front()) && key !== pointKey(contour.back())) {
        throw new InternalConsistencyError(`Open end ${key} is not an end of contour ${id}`)
      }
    }

    if (registry.size !== openEnds) {
      throw new InternalConsistencyError(
        `Level ${level} registers ${registry.size} open ends for ${openEnds} contour ends`
      )
    }

    this.checkSealedPoints(level, state)
  }

  /**
   * Excises loops from every contour and freezes the result. Levels come out
   * in ascending order.
   */
  public finish(): ContourPathMap {
    if (this.finished) {
      throw new InternalConsistencyError('Assembler has already finished')
    }
    this.finished = true

    const paths: ContourPathMap = new Map()
    for (const level of this.levelValues) {
      const state = this.levels.get(level)
      if (!state) continue
      this.checkSealedPoints(level, state)

      const excised = new ContourSet()
      for (const contour of state.contours.values()) {
        for (const piece of exciseLoops(contour, this.quickExcision)) {
          excised.add(piece)
        }
      }
      state.contours = excised

      if (state.skipped > 0) {
        console.warn(`Skipped ${state.skipped} zero-length segments at level ${level}`)
      }

      // TODO: Open ends that stop short of the grid boundary may have a partner
      // a rounding error away. Join such pairs level by level at their mean location.
      paths.set(level, [...excised.values()].map((contour) => contour.toPath()))
    }

    return paths
  }
}

export function assembleContours(
  events: Iterable<SegmentEvent>,
  options: AssemblyOptions = {}
): ContourPathMap {
  const assembler = new ContourAssembler(options)
  assembler.addAll(events)
  return assembler.finish()
}
