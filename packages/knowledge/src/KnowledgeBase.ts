import { createLogger, Logger } from "@deduce/core";
import { Cell, CellSet, ReadonlyCellSet, formatCell } from "./cell";
import { Sentence } from "./Sentence";
import { ContractViolationError, InvariantViolationError } from "./errors";

/**
 * Upper bound on inference passes per grid cell. Every productive pass
 * resolves a cell, drops a sentence or adds a sentence that was never held
 * before, so the loop converges long before this on well-formed input.
 */
export const PASSES_PER_CELL = 16;

export interface KnowledgeBaseOptions {
  height: number;
  width: number;
  /** Uniform source in [0, 1) used by makeRandomMove. Defaults to Math.random. */
  random?: () => number;
  logger?: Logger;
}

/** What one call to addKnowledge / addSentence managed to prove. */
export interface InferenceReport {
  passes: number;
  safes: Cell[];
  mines: Cell[];
  derived: number;
  pruned: number;
}

/**
 * Knowledge of a single Minesweeper episode: the cells observed so far,
 * the cells proven mines or safe, and the sentences not yet resolved.
 */
export class KnowledgeBase {
  readonly height: number;
  readonly width: number;

  private readonly moves = new CellSet();
  private readonly mineSet = new CellSet();
  private readonly safeSet = new CellSet();
  private knowledge: Sentence[] = [];
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(opts: KnowledgeBaseOptions) {
    if (!isPositiveInteger(opts.height) || !isPositiveInteger(opts.width)) {
      throw new ContractViolationError(
        `Grid dimensions must be positive integers, got ${opts.height}x${opts.width}`
      );
    }
    this.height = opts.height;
    this.width = opts.width;
    this.random = opts.random ?? Math.random;
    this.log = opts.logger ?? createLogger("knowledge");
  }

  get movesMade(): ReadonlyCellSet {
    return this.moves;
  }

  get mines(): ReadonlyCellSet {
    return this.mineSet;
  }

  get safes(): ReadonlyCellSet {
    return this.safeSet;
  }

  /** Copies of the active sentences in insertion order. */
  get sentences(): readonly Sentence[] {
    return this.knowledge.map((sentence) => sentence.clone());
  }

  get passLimit(): number {
    return PASSES_PER_CELL * (this.height * this.width + 1);
  }

  contains(cell: Cell): boolean {
    return (
      Number.isInteger(cell.row) &&
      Number.isInteger(cell.col) &&
      cell.row >= 0 &&
      cell.row < this.height &&
      cell.col >= 0 &&
      cell.col < this.width
    );
  }

  /** In-bounds cells within one row and column, excluding the cell itself. */
  neighbors(cell: Cell): Cell[] {
    const result: Cell[] = [];
    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        if (dr === 0 && dc === 0) continue;
        const next = { row: cell.row + dr, col: cell.col + dc };
        if (this.contains(next)) result.push(next);
      }
    }
    return result;
  }

  markMine(cell: Cell): void {
    this.assertCell(cell);
    if (this.safeSet.has(cell)) {
      throw new InvariantViolationError(
        `Cell ${formatCell(cell)} is already known to be safe`
      );
    }
    this.mineSet.add(cell);
    for (const sentence of this.knowledge) {
      sentence.markMine(cell);
    }
  }

  markSafe(cell: Cell): void {
    this.assertCell(cell);
    if (this.mineSet.has(cell)) {
      throw new InvariantViolationError(
        `Cell ${formatCell(cell)} is already known to be a mine`
      );
    }
    this.safeSet.add(cell);
    for (const sentence of this.knowledge) {
      sentence.markSafe(cell);
    }
  }

  /**
   * Record that `cell` was revealed safe with `count` mines among its
   * neighbors, then infer everything that follows.
   */
  addKnowledge(cell: Cell, count: number): InferenceReport {
    this.assertCell(cell);
    if (this.moves.has(cell)) {
      throw new ContractViolationError(`Cell ${formatCell(cell)} was already observed`);
    }
    if (this.mineSet.has(cell)) {
      throw new ContractViolationError(
        `Cell ${formatCell(cell)} is a known mine and cannot be observed`
      );
    }
    const neighbors = this.neighbors(cell);
    if (!Number.isInteger(count) || count < 0 || count > neighbors.length) {
      throw new ContractViolationError(
        `Count ${count} for ${formatCell(cell)} is not between 0 and ${neighbors.length}`
      );
    }

    this.moves.add(cell);
    this.markSafe(cell);
    const report = this.ingest(neighbors, count);

    this.log.debug(
      {
        cell: formatCell(cell),
        count,
        passes: report.passes,
        safes: report.safes.length,
        mines: report.mines.length,
        sentences: this.knowledge.length,
      },
      "Knowledge added"
    );
    return report;
  }

  /**
   * Assert that exactly `count` of `cells` are mines, e.g. a constraint
   * known from outside the neighbor counts, then infer.
   */
  addSentence(cells: Iterable<Cell>, count: number): InferenceReport {
    const members = new CellSet(cells);
    for (const cell of members) this.assertCell(cell);
    if (!Number.isInteger(count) || count < 0 || count > members.size) {
      throw new ContractViolationError(
        `Count ${count} is not between 0 and ${members.size}`
      );
    }
    return this.ingest(members, count);
  }

  /** First known-safe cell that has not been played yet, or null. */
  makeSafeMove(): Cell | null {
    for (const cell of this.safeSet) {
      if (!this.moves.has(cell)) return cell;
    }
    return null;
  }

  /**
   * Uniform pick among cells that were neither played nor proven mines.
   * Known-safe cells stay eligible. Null when nothing is left.
   */
  makeRandomMove(): Cell | null {
    const candidates: Cell[] = [];
    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        const cell = { row, col };
        if (!this.moves.has(cell) && !this.mineSet.has(cell)) {
          candidates.push(cell);
        }
      }
    }
    if (candidates.length === 0) return null;
    const index = Math.min(
      candidates.length - 1,
      Math.floor(this.random() * candidates.length)
    );
    return candidates[index];
  }

  private ingest(cells: Iterable<Cell>, count: number): InferenceReport {
    let remaining = count;
    const unknown: Cell[] = [];
    for (const cell of cells) {
      if (this.mineSet.has(cell)) {
        remaining -= 1;
      } else if (!this.safeSet.has(cell)) {
        unknown.push(cell);
      }
    }

    const sentence = new Sentence(unknown, remaining);
    if (!sentence.isEmpty && !this.holds(sentence)) {
      this.knowledge.push(sentence);
    }
    return this.infer();
  }

  private holds(sentence: Sentence): boolean {
    return this.knowledge.some((known) => known.equals(sentence));
  }

  /** Resolve, prune and derive until a whole pass changes nothing. */
  private infer(): InferenceReport {
    const report: InferenceReport = {
      passes: 0,
      safes: [],
      mines: [],
      derived: 0,
      pruned: 0,
    };
    const limit = this.passLimit;

    let changed = true;
    while (changed) {
      if (report.passes >= limit) {
        throw new InvariantViolationError(
          `Inference did not reach a fixed point within ${limit} passes`
        );
      }
      report.passes++;
      changed = false;

      // Collect before marking: marks rewrite the sentences being scanned.
      const newSafes = new CellSet();
      const newMines = new CellSet();
      for (const sentence of this.knowledge) {
        for (const cell of sentence.knownSafes()) {
          if (!this.safeSet.has(cell)) newSafes.add(cell);
        }
        for (const cell of sentence.knownMines()) {
          if (!this.mineSet.has(cell)) newMines.add(cell);
        }
      }

      for (const cell of newSafes) {
        this.markSafe(cell);
        report.safes.push(cell);
      }
      for (const cell of newMines) {
        this.markMine(cell);
        report.mines.push(cell);
      }
      if (newSafes.size > 0 || newMines.size > 0) changed = true;

      const kept: Sentence[] = [];
      for (const sentence of this.knowledge) {
        if (sentence.isEmpty) continue;
        if (kept.some((other) => other.equals(sentence))) continue;
        kept.push(sentence);
      }
      const pruned = this.knowledge.length - kept.length;
      if (pruned > 0) {
        this.knowledge = kept;
        report.pruned += pruned;
        changed = true;
      }

      const derived: Sentence[] = [];
      for (const subset of this.knowledge) {
        for (const superset of this.knowledge) {
          if (subset === superset) continue;
          if (subset.cells.size >= superset.cells.size) continue;
          if (!subset.cells.isSubsetOf(superset.cells)) continue;

          const candidate = new Sentence(
            superset.cells.difference(subset.cells),
            superset.count - subset.count
          );
          if (this.holds(candidate)) continue;
          if (derived.some((other) => other.equals(candidate))) continue;
          derived.push(candidate);
        }
      }
      if (derived.length > 0) {
        this.knowledge.push(...derived);
        report.derived += derived.length;
        changed = true;
      }
    }

    return report;
  }

  private assertCell(cell: Cell): void {
    if (!this.contains(cell)) {
      throw new ContractViolationError(
        `Cell ${formatCell(cell)} is not on the ${this.height}x${this.width} grid`
      );
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
