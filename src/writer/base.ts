import { promises as fs } from 'node:fs'
import { ContourPathMap } from '../types/contours'
import { FormatterOptions } from '../types/paths'
import { Formatter } from './formatter'

export class PathWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PathWriteError'
  }
}

export class PathWriter {
  private formatter: Formatter

  constructor(options: FormatterOptions = {}) {
    this.formatter = new Formatter(options)
  }

  public format(paths: ContourPathMap, levels: number[] = []): string {
    try {
      return this.formatter.format(paths, levels)
    } catch (error) {
      throw new PathWriteError(
        `Failed to write paths: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
  }

  public async formatAndWrite(
    paths: ContourPathMap,
    outputPath: string,
    levels: number[] = []
  ): Promise<string> {
    const json = this.format(paths, levels)
    try {
      await fs.writeFile(outputPath, json + '\n', 'utf8')
    } catch (error) {
      throw new PathWriteError(`Failed to write ${outputPath}: ${error}`)
    }
    return json
  }
}
