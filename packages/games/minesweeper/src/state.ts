export type Coord = { row: number; col: number };

export type GameStatus = "playing" | "won" | "lost" | "resigned";

/** The game-specific data stored in GameState.data */
export type MinesweeperData = {
  height: number;
  width: number;
  mineCount: number;
  /** Mine layout; hidden from observations until the game ends */
  mines: boolean[][];
  /** Neighbor-mine count of each revealed cell, null while hidden */
  revealed: (number | null)[][];
  flagged: boolean[][];
  /** The mine the player revealed, if any */
  exploded: Coord | null;
  resigned: boolean;
};

export function createGrid<T>(height: number, width: number, fill: T): T[][] {
  return Array.from({ length: height }, () => Array<T>(width).fill(fill));
}

export function cloneGrid<T>(grid: T[][]): T[][] {
  return grid.map((row) => [...row]);
}

/** Fresh data for a board with the given mine layout: nothing revealed or flagged. */
export function newBoardData(mines: boolean[][]): MinesweeperData {
  const height = mines.length;
  const width = height > 0 ? mines[0].length : 0;
  let mineCount = 0;
  for (const row of mines) {
    for (const mine of row) if (mine) mineCount++;
  }
  return {
    height,
    width,
    mineCount,
    mines: cloneGrid(mines),
    revealed: createGrid<number | null>(height, width, null),
    flagged: createGrid(height, width, false),
    exploded: null,
    resigned: false,
  };
}

export function cloneData(data: MinesweeperData): MinesweeperData {
  return {
    ...data,
    mines: cloneGrid(data.mines),
    revealed: cloneGrid(data.revealed),
    flagged: cloneGrid(data.flagged),
    exploded: data.exploded ? { ...data.exploded } : null,
  };
}

export function isInside(data: { height: number; width: number }, cell: Coord): boolean {
  return (
    Number.isInteger(cell.row) &&
    Number.isInteger(cell.col) &&
    cell.row >= 0 &&
    cell.row < data.height &&
    cell.col >= 0 &&
    cell.col < data.width
  );
}

export function countFlags(data: MinesweeperData): number {
  let flags = 0;
  for (const row of data.flagged) {
    for (const flag of row) if (flag) flags++;
  }
  return flags;
}

/** Mine positions in row-major order. */
export function listMines(data: MinesweeperData): Coord[] {
  const cells: Coord[] = [];
  for (let row = 0; row < data.height; row++) {
    for (let col = 0; col < data.width; col++) {
      if (data.mines[row][col]) cells.push({ row, col });
    }
  }
  return cells;
}

/** True when the flags sit exactly on the mines. A board without mines is never won this way. */
export function allMinesFlagged(data: MinesweeperData): boolean {
  if (data.mineCount === 0) return false;
  return data.mines.every((row, r) => row.every((mine, c) => mine === data.flagged[r][c]));
}

/** True when every safe cell has been revealed. */
export function boardCleared(data: MinesweeperData): boolean {
  return data.mines.every((row, r) =>
    row.every((mine, c) => mine || data.revealed[r][c] !== null)
  );
}

export function statusOf(data: MinesweeperData): GameStatus {
  if (data.exploded) return "lost";
  if (data.resigned) return "resigned";
  if (allMinesFlagged(data) || boardCleared(data)) return "won";
  return "playing";
}

// ---------------------------------------------------------------------------
// Narrowing of untyped state/observation records
// ---------------------------------------------------------------------------

export function isCoord(value: unknown): value is Coord {
  return (
    typeof value === "object" &&
    value !== null &&
    "row" in value &&
    typeof value.row === "number" &&
    "col" in value &&
    typeof value.col === "number"
  );
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

export function isCount(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

export function isGrid<T>(
  value: unknown,
  height: number,
  width: number,
  isCell: (cell: unknown) => cell is T
): value is T[][] {
  return (
    Array.isArray(value) &&
    value.length === height &&
    value.every((row) => Array.isArray(row) && row.length === width && row.every(isCell))
  );
}

/** Read GameState.data back into its typed form; throws on anything malformed. */
export function readData(raw: Record<string, unknown>): MinesweeperData {
  const { height, width, mineCount, mines, revealed, flagged, exploded, resigned } = raw;
  if (
    typeof height !== "number" ||
    typeof width !== "number" ||
    typeof mineCount !== "number" ||
    !isGrid(mines, height, width, isBoolean) ||
    !isGrid(revealed, height, width, isCount) ||
    !isGrid(flagged, height, width, isBoolean) ||
    !(exploded === null || isCoord(exploded)) ||
    typeof resigned !== "boolean"
  ) {
    throw new Error("Malformed minesweeper state");
  }
  return { height, width, mineCount, mines, revealed, flagged, exploded, resigned };
}
