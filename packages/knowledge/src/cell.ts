/** A grid coordinate. Compared by value, never by identity. */
export interface Cell {
  readonly row: number;
  readonly col: number;
}

export function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}

export function formatCell(cell: Cell): string {
  return `(${cell.row},${cell.col})`;
}

/** Read-only view of a CellSet, handed out to callers that must not mutate it. */
export interface ReadonlyCellSet extends Iterable<Cell> {
  readonly size: number;
  has(cell: Cell): boolean;
  values(): IterableIterator<Cell>;
  toArray(): Cell[];
  isSubsetOf(other: ReadonlyCellSet): boolean;
  equals(other: ReadonlyCellSet): boolean;
  difference(other: ReadonlyCellSet): CellSet;
}

/**
 * Insertion-ordered set of cells keyed by coordinate value.
 * Stored cells are private copies, so mutating the object passed to `add`
 * never affects set membership.
 */
export class CellSet implements ReadonlyCellSet {
  private readonly items = new Map<string, Cell>();

  constructor(cells: Iterable<Cell> = []) {
    for (const cell of cells) this.add(cell);
  }

  get size(): number {
    return this.items.size;
  }

  has(cell: Cell): boolean {
    return this.items.has(cellKey(cell));
  }

  /** Returns true when the cell was not already present. */
  add(cell: Cell): boolean {
    const key = cellKey(cell);
    if (this.items.has(key)) return false;
    this.items.set(key, Object.freeze({ row: cell.row, col: cell.col }));
    return true;
  }

  delete(cell: Cell): boolean {
    return this.items.delete(cellKey(cell));
  }

  values(): IterableIterator<Cell> {
    return this.items.values();
  }

  [Symbol.iterator](): IterableIterator<Cell> {
    return this.items.values();
  }

  toArray(): Cell[] {
    return Array.from(this.items.values());
  }

  clone(): CellSet {
    return new CellSet(this.items.values());
  }

  isSubsetOf(other: ReadonlyCellSet): boolean {
    if (this.size > other.size) return false;
    for (const cell of this.items.values()) {
      if (!other.has(cell)) return false;
    }
    return true;
  }

  equals(other: ReadonlyCellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  /** Cells of this set that are not in `other`, in this set's order. */
  difference(other: ReadonlyCellSet): CellSet {
    const out = new CellSet();
    for (const cell of this.items.values()) {
      if (!other.has(cell)) out.add(cell);
    }
    return out;
  }

  toJSON(): Cell[] {
    return this.toArray();
  }

  toString(): string {
    return `{${this.toArray().map(formatCell).join(", ")}}`;
  }
}
