// Raised when an assembly invariant does not hold. This is a defect in the
// segment generator or in the engine itself, never a data condition, and is
// not caught anywhere inside the engine.
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InternalConsistencyError'
  }
}
