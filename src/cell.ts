export enum Cell {
  Dead = 0,
  Alive = 1,
}

// The only place a cell's state is read as a number.
export function cellValue(cell: Cell): 0 | 1 {
  return cell === Cell.Alive ? 1 : 0
}
