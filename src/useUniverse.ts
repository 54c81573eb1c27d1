import { useCallback, useEffect, useMemo, useRef, useState } from 'react'
import { decodeCells, encodeCells } from './patternCodec'
import { PatternDecodeError } from './errors'
import type { UniverseOptions } from './options'
import { placePreset as stampPreset, wrapOnto, type PresetId } from './presets'
import { Universe, type Coordinate } from './universe'

export const DEFAULT_DELAY_MS = 160

export type UseUniverseOptions = UniverseOptions & {
  delayMs?: number
}

export function useUniverse(options: UseUniverseOptions = {}) {
  const { delayMs: initialDelay = DEFAULT_DELAY_MS, ...universeOptions } = options
  // Later renders may pass fresh option objects; only the first one counts.
  const initialOptions = useRef<UniverseOptions>(universeOptions)
  const [universe, setUniverse] = useState(() => new Universe(initialOptions.current))
  const [generation, setGeneration] = useState(0)
  // Bumped on every in-place mutation so derived values recompute.
  const [revision, setRevision] = useState(0)
  const [isPlaying, setIsPlaying] = useState(false)
  const [delayMs, setDelayMs] = useState(initialDelay)
  const intervalRef = useRef<ReturnType<typeof setInterval> | null>(null)

  const touch = useCallback(() => setRevision((r) => r + 1), [])

  const step = useCallback(() => {
    universe.tick()
    setGeneration((g) => g + 1)
    touch()
  }, [universe, touch])

  const play = useCallback(() => setIsPlaying(true), [])
  const pause = useCallback(() => setIsPlaying(false), [])
  const toggle = useCallback(() => setIsPlaying((p) => !p), [])

  const reset = useCallback(() => {
    setIsPlaying(false)
    setUniverse(new Universe(initialOptions.current))
    setGeneration(0)
  }, [])

  const resize = useCallback(
    (width: number, height: number) => {
      universe.resize(width, height)
      setIsPlaying(false)
      setGeneration(0)
      touch()
    },
    [universe, touch],
  )

  const setCells = useCallback(
    (cells: Iterable<Coordinate>) => {
      universe.setCells(cells)
      touch()
    },
    [universe, touch],
  )

  const placePreset = useCallback(
    (id: PresetId, anchorRow: number, anchorCol: number) => {
      stampPreset(universe, id, anchorRow, anchorCol)
      touch()
    },
    [universe, touch],
  )

  const sharePattern = useCallback(() => encodeCells(universe.liveCells()), [universe])

  /** Replaces the grid with a shared pattern. Returns false if it could not be read. */
  const loadPattern = useCallback(
    (encoded: string): boolean => {
      let cells: Array<[number, number]>
      try {
        cells = decodeCells(encoded)
      } catch (err) {
        if (!(err instanceof PatternDecodeError)) throw err
        console.warn('Ignoring shared pattern:', err.message)
        return false
      }
      setIsPlaying(false)
      const next = new Universe({ width: universe.width, height: universe.height, seed: 'empty' })
      next.setCells(wrapOnto(next, cells))
      setUniverse(next)
      setGeneration(0)
      return true
    },
    [universe],
  )

  useEffect(() => {
    if (isPlaying) {
      intervalRef.current = setInterval(step, delayMs)
    }
    return () => {
      if (intervalRef.current !== null) {
        clearInterval(intervalRef.current)
        intervalRef.current = null
      }
    }
  }, [isPlaying, delayMs, step])

  // revision stands in for the universe's internal state
  const text = useMemo(() => universe.render(), [universe, revision])
  const population = useMemo(() => universe.population(), [universe, revision])

  return {
    universe,
    generation,
    population,
    text,
    isPlaying,
    delayMs,
    setDelayMs,
    play,
    pause,
    toggle,
    step,
    reset,
    resize,
    setCells,
    placePreset,
    sharePattern,
    loadPattern,
  }
}

export type UniverseController = ReturnType<typeof useUniverse>
