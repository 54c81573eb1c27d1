import { z } from 'zod'
import presetData from './presets.json'
import type { Coordinate, Universe } from './universe'

export type PresetId = keyof typeof presetData

const PresetSchema = z.object({
  label: z.string(),
  cells: z.array(z.tuple([z.number().int(), z.number().int()])),
})

export type Preset = z.infer<typeof PresetSchema>

const PRESETS: Record<string, Preset> = z.record(PresetSchema).parse(presetData)

export function presetIds(): PresetId[] {
  return Object.keys(presetData).filter(isPresetId)
}

export function isPresetId(value: string): value is PresetId {
  return Object.prototype.hasOwnProperty.call(presetData, value)
}

export function getPreset(id: PresetId): Preset {
  return PRESETS[id]
}

export interface PatternBounds {
  minRow: number
  maxRow: number
  minCol: number
  maxCol: number
}

export function patternBounds(cells: Iterable<Coordinate>): PatternBounds | null {
  let minR = Infinity, maxR = -Infinity, minC = Infinity, maxC = -Infinity
  for (const [r, c] of cells) {
    if (r < minR) minR = r
    if (r > maxR) maxR = r
    if (c < minC) minC = c
    if (c > maxC) maxC = c
  }
  if (minR === Infinity) return null
  return { minRow: minR, maxRow: maxR, minCol: minC, maxCol: maxC }
}

function wrap(value: number, size: number): number {
  return ((value % size) + size) % size
}

/** Offsets the cells by the anchor and folds them onto the torus. */
export function wrapOnto(universe: Universe, cells: Iterable<Coordinate>, anchorRow = 0, anchorCol = 0): Array<[number, number]> {
  const out: Array<[number, number]> = []
  for (const [r, c] of cells) {
    out.push([wrap(anchorRow + r, universe.height), wrap(anchorCol + c, universe.width)])
  }
  return out
}

export function placePreset(universe: Universe, id: PresetId, anchorRow: number, anchorCol: number): void {
  universe.setCells(wrapOnto(universe, getPreset(id).cells, anchorRow, anchorCol))
}
