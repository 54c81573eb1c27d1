import { Cell, cellValue } from './cell'
import { type Dimension, IndexOutOfRangeError } from './errors'
import { assertDimension, assertGridSize, resolveUniverseOptions, seedCell, type UniverseOptions } from './options'

export type Coordinate = readonly [row: number, column: number]

const ALIVE_GLYPH = '◼'
const DEAD_GLYPH = '◻'

function deadCells(size: number): Cell[] {
  return new Array<Cell>(size).fill(Cell.Dead)
}

/**
 * A wrapping grid of cells. Row 0's upper neighbor is the last row and
 * column 0's left neighbor is the last column.
 */
export class Universe {
  private _width: number
  private _height: number
  private cells: Cell[]

  constructor(options: UniverseOptions = {}) {
    const { width, height, seed } = resolveUniverseOptions(options)
    this._width = width
    this._height = height
    this.cells = Array.from({ length: width * height }, (_, i) => (seedCell(seed, i) ? Cell.Alive : Cell.Dead))
  }

  get width(): number {
    return this._width
  }

  get height(): number {
    return this._height
  }

  /** Sets the width and resets every cell to dead. */
  setWidth(width: number): void {
    this.reallocate(width, this._height, 'width')
  }

  /** Sets the height and resets every cell to dead. */
  setHeight(height: number): void {
    this.reallocate(this._width, height, 'height')
  }

  /**
   * Sets both dimensions and resets every cell to dead. Nothing changes if
   * either dimension is rejected.
   */
  resize(width: number, height: number): void {
    this.reallocate(width, height, 'height')
  }

  getIndex(row: number, column: number): number {
    if (!this.contains(row, column)) {
      throw new IndexOutOfRangeError(row, column, this._height, this._width)
    }
    return row * this._width + column
  }

  getCell(row: number, column: number): Cell {
    return this.cells[this.getIndex(row, column)]
  }

  liveNeighborCount(row: number, column: number): number {
    this.getIndex(row, column)
    const height = this._height
    const width = this._width
    let count = 0
    // height - 1 and width - 1 stand in for -1 without going negative.
    for (const deltaRow of [height - 1, 0, 1]) {
      for (const deltaCol of [width - 1, 0, 1]) {
        // On a 1-wide axis every delta lands back on the cell itself.
        if (deltaRow % height === 0 && deltaCol % width === 0) continue
        const neighborRow = (row + deltaRow) % height
        const neighborCol = (column + deltaCol) % width
        count += cellValue(this.cells[neighborRow * width + neighborCol])
      }
    }
    return count
  }

  /** Advances one generation. */
  tick(): void {
    const next = this.cells.slice()
    for (let row = 0; row < this._height; row += 1) {
      for (let col = 0; col < this._width; col += 1) {
        const idx = row * this._width + col
        next[idx] = nextState(this.cells[idx], this.liveNeighborCount(row, col))
      }
    }
    this.cells = next
  }

  /**
   * Marks each coordinate alive and leaves every other cell as it was.
   * Throws before touching the grid if any coordinate is out of range.
   */
  setCells(coordinates: Iterable<Coordinate>): void {
    const indices: number[] = []
    for (const [row, column] of coordinates) indices.push(this.getIndex(row, column))
    for (const idx of indices) this.cells[idx] = Cell.Alive
  }

  /** The current generation's buffer; tick and resize replace it, so do not hold on to it. */
  getCells(): readonly Cell[] {
    return this.cells
  }

  /** One byte per cell, row-major, for renderers that want pixel access. */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.cells, cellValue)
  }

  liveCells(): Array<[number, number]> {
    const out: Array<[number, number]> = []
    this.cells.forEach((cell, idx) => {
      if (cell === Cell.Alive) out.push([Math.floor(idx / this._width), idx % this._width])
    })
    return out
  }

  population(): number {
    let count = 0
    for (const cell of this.cells) count += cellValue(cell)
    return count
  }

  render(): string {
    let out = ''
    for (let start = 0; start < this.cells.length; start += this._width) {
      for (const cell of this.cells.slice(start, start + this._width)) {
        out += cell === Cell.Alive ? ALIVE_GLYPH : DEAD_GLYPH
      }
      out += '\n'
    }
    return out
  }

  toString(): string {
    return this.render()
  }

  // The new buffer is built before any field changes.
  private reallocate(width: number, height: number, blame: Dimension): void {
    assertDimension('width', width)
    assertDimension('height', height)
    const cells = deadCells(assertGridSize(blame, width, height))
    this._width = width
    this._height = height
    this.cells = cells
  }

  private contains(row: number, column: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(column) &&
      row >= 0 &&
      column >= 0 &&
      row < this._height &&
      column < this._width
    )
  }
}

function nextState(cell: Cell, liveNeighbors: number): Cell {
  if (cell === Cell.Alive) {
    // underpopulation and overpopulation
    if (liveNeighbors < 2 || liveNeighbors > 3) return Cell.Dead
    return Cell.Alive
  }
  // reproduction
  return liveNeighbors === 3 ? Cell.Alive : Cell.Dead
}
