import { Cell, CellSet, ReadonlyCellSet } from "./cell";
import { InvariantViolationError } from "./errors";

/**
 * Logical statement about a board: exactly `count` of `cells` are mines.
 *
 * Membership shrinks as facts are learned; the count only moves when a
 * member turns out to be a mine. `0 <= count <= cells.size` holds after
 * every operation, otherwise an InvariantViolationError is thrown.
 */
export class Sentence {
  private readonly members: CellSet;
  private mineCount: number;

  constructor(cells: Iterable<Cell>, count: number) {
    this.members = new CellSet(cells);
    this.mineCount = count;
    this.assertCount();
  }

  get cells(): ReadonlyCellSet {
    return this.members;
  }

  get count(): number {
    return this.mineCount;
  }

  get isEmpty(): boolean {
    return this.members.size === 0;
  }

  /** Every member is a mine when the count covers all remaining cells. */
  knownMines(): CellSet {
    if (this.mineCount === this.members.size) return this.members.clone();
    return new CellSet();
  }

  /** Every member is safe when no mines are left to place. */
  knownSafes(): CellSet {
    if (this.mineCount === 0) return this.members.clone();
    return new CellSet();
  }

  markMine(cell: Cell): void {
    if (!this.members.delete(cell)) return;
    this.mineCount -= 1;
    this.assertCount();
  }

  markSafe(cell: Cell): void {
    if (!this.members.delete(cell)) return;
    this.assertCount();
  }

  clone(): Sentence {
    return new Sentence(this.members, this.mineCount);
  }

  equals(other: Sentence): boolean {
    return this.mineCount === other.mineCount && this.members.equals(other.members);
  }

  toJSON(): { cells: Cell[]; count: number } {
    return { cells: this.members.toArray(), count: this.mineCount };
  }

  toString(): string {
    return `${this.members.toString()} = ${this.mineCount}`;
  }

  private assertCount(): void {
    const count = this.mineCount;
    if (!Number.isInteger(count) || count < 0 || count > this.members.size) {
      throw new InvariantViolationError(
        `Sentence ${this.toString()} has a mine count outside 0..${this.members.size}`
      );
    }
  }
}
