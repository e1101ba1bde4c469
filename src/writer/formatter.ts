import { OUTPUT_PRECISION } from '../constants'
import { Point } from '../types/base'
import { ContourPath, ContourPathMap } from '../types/contours'
import { FormatterOptions, SerializedContours, SerializedLevel, SerializedPath } from '../types/paths'
import { countDistinctPoints } from '../utils/points'

export class FormatterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatterError'
  }
}

export class Formatter {
  private readonly precision: number

  constructor(options: FormatterOptions = {}) {
    const precision = options.precision ?? OUTPUT_PRECISION
    if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
      throw new FormatterError(`Invalid precision: ${precision}`)
    }
    this.precision = precision
  }

  private formatPoint(point: Point): [number, number] {
    const x = Number(point.x.toFixed(this.precision))
    const y = Number(point.y.toFixed(this.precision))
    return [x, y]
  }

  // Paths with nothing to stroke are dropped.
  private formatPath(path: ContourPath): SerializedPath | null {
    if (countDistinctPoints(path.points) < 2) {
      return null
    }
    return { closed: path.closed, points: path.points.map((p) => this.formatPoint(p)) }
  }

  /**
   * Lays out the paths level by level, ascending. Levels in `levels` are
   * listed even when nothing was drawn at them.
   */
  public serialize(paths: ContourPathMap, levels: number[] = []): SerializedContours {
    const allLevels = [...new Set([...levels, ...paths.keys()])].sort((a, b) => a - b)

    const output: SerializedLevel[] = allLevels.map((level) => {
      const serialized: SerializedPath[] = []
      for (const path of paths.get(level) ?? []) {
        const formatted = this.formatPath(path)
        if (formatted) {
          serialized.push(formatted)
        }
      }
      return { level, paths: serialized }
    })

    return { levels: output }
  }

  public format(paths: ContourPathMap, levels: number[] = []): string {
    return JSON.stringify(this.serialize(paths, levels), null, 2)
  }
}
