import { Point } from '../types/base'
import { ContourId } from '../types/contours'
import { pointKey } from '../utils/points'

/**
 * Open ends of the live contours at one iso-level.
 *
 * Every key is an end of exactly one contour. A contour that closes on itself
 * keeps its closing point registered, so segments crossing there still attach,
 * and the point is also recorded as sealed for the parity check at the end of
 * the level.
 */
export class EndpointRegistry {
  private readonly open = new Map<string, ContourId>()
  private readonly sealed = new Map<string, ContourId>()

  public lookup(p: Point): ContourId | undefined {
    return this.open.get(pointKey(p))
  }

  public set(p: Point, id: ContourId): void {
    this.open.set(pointKey(p), id)
  }

  public remove(p: Point): void {
    this.open.delete(pointKey(p))
  }

  public seal(p: Point, id: ContourId): void {
    this.sealed.set(pointKey(p), id)
  }

  public sealedAt(p: Point): ContourId | undefined {
    return this.sealed.get(pointKey(p))
  }

  public get size(): number {
    return this.open.size
  }

  *entries(): IterableIterator<[string, ContourId]> {
    yield* this.open.entries()
  }
}
