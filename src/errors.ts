export class UniverseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'UniverseError'
  }
}

export type Dimension = 'width' | 'height'

export class InvalidDimensionError extends UniverseError {
  readonly dimension: Dimension
  readonly value: unknown

  constructor(dimension: Dimension, value: unknown, reason = 'must be a positive integer') {
    super(`${dimension} ${reason}, got ${String(value)}`)
    this.name = 'InvalidDimensionError'
    this.dimension = dimension
    this.value = value
  }
}

export class IndexOutOfRangeError extends UniverseError {
  readonly row: number
  readonly column: number

  constructor(row: number, column: number, height: number, width: number) {
    super(`cell (${row}, ${column}) is outside the ${height}x${width} universe`)
    this.name = 'IndexOutOfRangeError'
    this.row = row
    this.column = column
  }
}

export class PatternDecodeError extends UniverseError {
  readonly input: string

  constructor(input: string, cause?: unknown) {
    const preview = input.length > 32 ? `${input.slice(0, 32)}...` : input
    super(`could not decode pattern "${preview}"`, { cause })
    this.name = 'PatternDecodeError'
    this.input = input
  }
}
