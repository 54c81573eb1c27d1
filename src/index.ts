export { Cell, cellValue } from './cell'
export {
  IndexOutOfRangeError,
  InvalidDimensionError,
  PatternDecodeError,
  UniverseError,
  type Dimension,
} from './errors'
export {
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  DimensionSchema,
  MAX_CELLS,
  UniverseOptionsSchema,
  resolveUniverseOptions,
  type ResolvedUniverseOptions,
  type SeedPattern,
  type UniverseOptions,
} from './options'
export { Universe, type Coordinate } from './universe'
export { decodeCells, encodeCells } from './patternCodec'
export {
  getPreset,
  isPresetId,
  patternBounds,
  placePreset,
  presetIds,
  wrapOnto,
  type PatternBounds,
  type Preset,
  type PresetId,
} from './presets'
export { DEFAULT_DELAY_MS, useUniverse, type UniverseController, type UseUniverseOptions } from './useUniverse'
