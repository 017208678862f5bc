import { SeededRng } from "./prng";
import { Coord, createGrid } from "./state";

/** In-bounds cells within one row and column of `cell`, excluding the cell itself. */
export function neighborsOf(height: number, width: number, cell: Coord): Coord[] {
  const result: Coord[] = [];
  for (let row = cell.row - 1; row <= cell.row + 1; row++) {
    for (let col = cell.col - 1; col <= cell.col + 1; col++) {
      if (row === cell.row && col === cell.col) continue;
      if (row >= 0 && row < height && col >= 0 && col < width) {
        result.push({ row, col });
      }
    }
  }
  return result;
}

/** Number of mines within one row and column of `cell`, not counting the cell itself. */
export function nearbyMines(mines: boolean[][], cell: Coord): number {
  const height = mines.length;
  const width = height > 0 ? mines[0].length : 0;
  return neighborsOf(height, width, cell).filter(({ row, col }) => mines[row][col]).length;
}

/** Place `count` mines uniformly at random; the same seed always gives the same layout. */
export function placeMines(
  height: number,
  width: number,
  count: number,
  rngSeed: string
): boolean[][] {
  const rng = new SeededRng(rngSeed);
  const grid = createGrid(height, width, false);
  for (const index of rng.sample(height * width, count)) {
    grid[Math.floor(index / width)][index % width] = true;
  }
  return grid;
}
