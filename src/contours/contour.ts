import { Point, Segment } from '../types/base'
import { ContourId, ContourPath } from '../types/contours'
import { newId } from '../utils/ids'
import { pointsEqual, reversed } from '../utils/points'
import { EndpointRegistry } from './endpoint_registry'
import { InternalConsistencyError } from './errors'

/**
 * A run of points lying along a contour line at height `z`.
 *
 * The path grows from the middle in both directions: `backward` ends at the
 * front and `forward` ends at the back, so the full path is
 * reverse(backward) followed by forward. Neither side is ever empty.
 */
export class Contour {
  public readonly id: ContourId
  public readonly z: number
  private readonly backward: Point[]
  private readonly forward: Point[]

  constructor(z: number, backward: Point[], forward: Point[], id: ContourId = newId('contour')) {
    if (backward.length === 0 || forward.length === 0) {
      throw new InternalConsistencyError(`Contour ${id} created with an empty side`)
    }
    this.id = id
    this.z = z
    this.backward = backward
    this.forward = forward
  }

  // Founding contour for a segment: the front is p2 and the back is p1.
  static fromSegment(segment: Segment, z: number): Contour {
    return new Contour(z, [segment.p2], [segment.p1])
  }

  // Contour whose path is exactly `points`, first point at the front.
  static fromPoints(points: Point[], z: number): Contour {
    return new Contour(z, points.slice(0, 1), points.slice(1))
  }

  public front(): Point {
    return this.lastOf(this.backward, 'backward')
  }

  public back(): Point {
    return this.lastOf(this.forward, 'forward')
  }

  private lastOf(side: Point[], name: string): Point {
    if (side.length === 0) {
      throw new InternalConsistencyError(`Contour ${this.id} has an empty ${name} side`)
    }
    return side[side.length - 1]
  }

  public isLoop(): boolean {
    return pointsEqual(this.front(), this.back())
  }

  // Points from front to back.
  public points(): Point[] {
    return [...reversed(this.backward), ...this.forward]
  }

  /**
   * Adds the segment to whichever open end it touches and moves that end's
   * registry key to the new point.
   */
  public extend(segment: Segment, registry: EndpointRegistry): void {
    const { p1, p2 } = segment
    const front = this.front()
    if (pointsEqual(front, p1)) {
      this.grow(this.backward, p1, p2, registry)
      return
    }
    if (pointsEqual(front, p2)) {
      this.grow(this.backward, p2, p1, registry)
      return
    }

    const back = this.back()
    if (pointsEqual(back, p1)) {
      this.grow(this.forward, p1, p2, registry)
      return
    }
    if (pointsEqual(back, p2)) {
      this.grow(this.forward, p2, p1, registry)
      return
    }

    throw new InternalConsistencyError(
      `Segment (${p1.x}, ${p1.y})-(${p2.x}, ${p2.y}) does not touch an open end of contour ${this.id}`
    )
  }

  private grow(side: Point[], from: Point, to: Point, registry: EndpointRegistry): void {
    side.push(to)
    // A loop reopened at its closing point keeps that point as its other end.
    if (!pointsEqual(this.front(), from) && !pointsEqual(this.back(), from)) {
      registry.remove(from)
    }
    registry.set(to, this.id)
  }

  /**
   * Joins `other` onto this contour at the open end they share. The other
   * contour's points are consumed; the caller drops it from the contour set.
   */
  public connect(other: Contour, registry: EndpointRegistry): void {
    if (other.id === this.id) {
      throw new InternalConsistencyError(`Contour ${this.id} cannot be connected to itself`)
    }
    if (other.z !== this.z) {
      throw new InternalConsistencyError(
        `Contours ${this.id} and ${other.id} lie on different levels (${this.z}, ${other.z})`
      )
    }

    const front = this.front()
    if (pointsEqual(front, other.front())) {
      this.join(this.backward, front, other.points(), registry)
      return
    }
    if (pointsEqual(front, other.back())) {
      this.join(this.backward, front, other.pathFromBack(), registry)
      return
    }

    const back = this.back()
    if (pointsEqual(back, other.front())) {
      this.join(this.forward, back, other.points(), registry)
      return
    }
    if (pointsEqual(back, other.back())) {
      this.join(this.forward, back, other.pathFromBack(), registry)
      return
    }

    throw new InternalConsistencyError(`Contours ${this.id} and ${other.id} share no open end`)
  }

  private join(side: Point[], shared: Point, otherPath: Point[], registry: EndpointRegistry): void {
    // otherPath starts at the shared point, which is already on this side.
    for (let i = 1; i < otherPath.length; i++) {
      side.push(otherPath[i])
    }
    registry.remove(shared)
    registry.set(otherPath[otherPath.length - 1], this.id)
  }

  private pathFromBack(): Point[] {
    return [...reversed(this.forward), ...this.backward]
  }

  public toPath(): ContourPath {
    return { level: this.z, closed: this.isLoop(), points: this.points() }
  }
}
