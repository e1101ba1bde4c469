import { GridCell, Point } from '../types/base'
import { ParseError } from './exceptions'

export function parseFinite(value: unknown, name: string): number {
  if (value === undefined || value === null) {
    throw new ParseError(`Missing ${name}`)
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ParseError(`Invalid ${name}: ${String(value)}`)
  }
  return value
}

function parsePair(value: unknown, name: string): [number, number] {
  if (value === undefined || value === null) {
    throw new ParseError(`Missing ${name}`)
  }
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ParseError(`Invalid ${name}: expected a pair of numbers`)
  }
  return [parseFinite(value[0], `${name}[0]`), parseFinite(value[1], `${name}[1]`)]
}

export function parsePoint(value: unknown, name: string): Point {
  const [x, y] = parsePair(value, name)
  return { x, y }
}

export function parseCell(value: unknown, name: string): GridCell | undefined {
  if (value === undefined) {
    return undefined
  }
  const [i, j] = parsePair(value, name)
  if (!Number.isInteger(i) || !Number.isInteger(j)) {
    throw new ParseError(`Invalid ${name}: cell indices must be integers`)
  }
  return { i, j }
}

export function parseLevels(value: unknown, name: string): number[] {
  if (!Array.isArray(value)) {
    throw new ParseError(`Invalid ${name}: expected an array of numbers`)
  }
  if (value.length === 0) {
    throw new ParseError(`Invalid ${name}: at least one level is required`)
  }
  return value.map((level, i) => parseFinite(level, `${name}[${i}]`))
}
