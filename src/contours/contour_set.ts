import { ContourId } from '../types/contours'
import { Contour } from './contour'
import { InternalConsistencyError } from './errors'

// Insertion-ordered arena of the live contours at one level.
export class ContourSet {
  private readonly contours = new Map<ContourId, Contour>()

  public add(contour: Contour): void {
    if (this.contours.has(contour.id)) {
      throw new InternalConsistencyError(`Contour ${contour.id} is already in the set`)
    }
    this.contours.set(contour.id, contour)
  }

  public get(id: ContourId): Contour {
    const contour = this.contours.get(id)
    if (!contour) {
      throw new InternalConsistencyError(`Contour ${id} is not in the set`)
    }
    return contour
  }

  public has(id: ContourId): boolean {
    return this.contours.has(id)
  }

  public delete(id: ContourId): void {
    if (!this.contours.delete(id)) {
      throw new InternalConsistencyError(`Contour ${id} is not in the set`)
    }
  }

  public get size(): number {
    return this.contours.size
  }

  *values(): IterableIterator<Contour> {
    yield* this.contours.values()
  }
}
