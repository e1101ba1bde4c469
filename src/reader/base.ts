import { promises as fs } from 'node:fs'
import { ParseError } from '../parsers/exceptions'
import { parseCell, parseFinite, parseLevels, parsePoint } from '../parsers/values'
import { SegmentEvent } from '../types/base'
import { EventStream } from '../types/events'

export class EventReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EventReadError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reads a segment event stream document:
 *
 *   { "levels": [0.5, 1], "events": [{ "level": 1, "p1": [0, 0.5], "p2": [0.5, 0], "cell": [0, 0] }] }
 *
 * Everything the assembler takes for granted is checked here: finite levels
 * and coordinates, a non-empty level list when one is given, and events only
 * at declared levels.
 */
export class EventReader {
  private readEvent(raw: unknown, index: number, declared?: Set<number>): SegmentEvent {
    const name = `events[${index}]`
    if (!isRecord(raw)) {
      throw new ParseError(`Invalid ${name}: expected an object`)
    }

    const level = parseFinite(raw.level, `${name}.level`)
    if (declared && !declared.has(level)) {
      throw new ParseError(`Invalid ${name}.level: ${level} is not a declared level`)
    }

    const event: SegmentEvent = {
      level,
      segment: {
        p1: parsePoint(raw.p1, `${name}.p1`),
        p2: parsePoint(raw.p2, `${name}.p2`)
      }
    }
    const cell = parseCell(raw.cell, `${name}.cell`)
    if (cell) {
      event.cell = cell
    }
    return event
  }

  public readValue(parsed: unknown): EventStream {
    if (!isRecord(parsed)) {
      throw new EventReadError('Event stream must be a JSON object')
    }

    try {
      let levels: number[] | undefined
      if (parsed.levels !== undefined) {
        levels = [...new Set(parseLevels(parsed.levels, 'levels'))].sort((a, b) => a - b)
      }

      if (!Array.isArray(parsed.events)) {
        throw new ParseError('Invalid events: expected an array')
      }
      if (parsed.events.length === 0) {
        throw new ParseError('Invalid events: the stream is empty')
      }

      const declared = levels ? new Set(levels) : undefined
      const events = parsed.events.map((raw: unknown, i: number) => this.readEvent(raw, i, declared))

      return levels ? { levels, events } : { events }
    } catch (error) {
      if (error instanceof ParseError) {
        throw new EventReadError(error.message)
      }
      throw error
    }
  }

  public readString(content: string): EventStream {
    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      throw new EventReadError(
        `Event stream is not valid JSON: ${error instanceof Error ? error.message : error}`
      )
    }
    return this.readValue(parsed)
  }

  public async readFile(filepath: string): Promise<EventStream> {
    let content: string
    try {
      content = await fs.readFile(filepath, 'utf8')
    } catch (error) {
      throw new EventReadError(`Failed to read event file ${filepath}: ${error}`)
    }
    return this.readString(content)
  }
}
