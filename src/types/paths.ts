// Serialized form of the assembled contours.
export type SerializedPath = {
  closed: boolean
  points: [number, number][]
}

export type SerializedLevel = {
  level: number
  paths: SerializedPath[]
}

export type SerializedContours = {
  levels: SerializedLevel[]
}

// Options that control path output.
export type FormatterOptions = {
  precision?: number // Decimal places kept per coordinate.
}
