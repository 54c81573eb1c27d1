import { z } from 'zod'
import { type Dimension, InvalidDimensionError, UniverseError } from './errors'

export const DEFAULT_WIDTH = 64
export const DEFAULT_HEIGHT = 64

export const DimensionSchema = z.number().int().min(1)

// Cell counts stay within an unsigned 32-bit range.
export const MAX_CELLS = 2 ** 32 - 1

/**
 * `demo` marks a cell alive when its row-major index is a multiple of 2 or 7.
 * `empty` starts with every cell dead.
 */
export const SeedPatternSchema = z.enum(['demo', 'empty'])
export type SeedPattern = z.infer<typeof SeedPatternSchema>

export const UniverseOptionsSchema = z.object({
  width: DimensionSchema.default(DEFAULT_WIDTH),
  height: DimensionSchema.default(DEFAULT_HEIGHT),
  seed: SeedPatternSchema.default('demo'),
})

export type UniverseOptions = z.input<typeof UniverseOptionsSchema>
export type ResolvedUniverseOptions = z.output<typeof UniverseOptionsSchema>

export function resolveUniverseOptions(input: UniverseOptions = {}): ResolvedUniverseOptions {
  const parsed = UniverseOptionsSchema.safeParse(input)
  if (parsed.success) {
    assertGridSize('height', parsed.data.width, parsed.data.height)
    return parsed.data
  }
  const issue = parsed.error.issues[0]
  const field = issue.path[0]
  if (field === 'width' || field === 'height') {
    throw new InvalidDimensionError(field, input[field])
  }
  throw new UniverseError(`invalid universe options: ${issue.message}`)
}

export function assertDimension(dimension: Dimension, value: number): number {
  if (!DimensionSchema.safeParse(value).success) {
    throw new InvalidDimensionError(dimension, value)
  }
  return value
}

/** Throws when `width * height` would exceed MAX_CELLS, blaming `dimension`. */
export function assertGridSize(dimension: Dimension, width: number, height: number): number {
  const size = width * height
  if (size > MAX_CELLS) {
    const value = dimension === 'width' ? width : height
    throw new InvalidDimensionError(dimension, value, `must keep the grid within ${MAX_CELLS} cells`)
  }
  return size
}

export function seedCell(seed: SeedPattern, index: number): boolean {
  switch (seed) {
    case 'demo':
      return index % 2 === 0 || index % 7 === 0
    case 'empty':
      return false
  }
}
