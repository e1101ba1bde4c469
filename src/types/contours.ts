import { Point } from './base'

// Stable handle into a level's contour set.
export type ContourId = string

// Options that control contour assembly.
export type AssemblyOptions = {
  quickExcision?: boolean // Use the single self-touch shortcut where it applies.
}

// A finalized contour line, in grid space, ready for a caller to transform and stroke.
export type ContourPath = {
  level: number
  closed: boolean // First and last points coincide.
  points: Point[]
}

// Per-level output, keys inserted in ascending level order.
export type ContourPathMap = Map<number, ContourPath[]>
