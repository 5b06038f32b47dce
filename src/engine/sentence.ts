import { CellSet } from "./cells";
import type { ReadonlyCellSet } from "./cells";
import { ContradictionError } from "./errors";
import type { Pos } from "./types";

/**
 * A logical statement about the board: exactly `count` of `cells` are mines.
 *
 * Sentences shrink as cells get resolved. `markMine` removes a cell and
 * accounts for its mine; `markSafe` removes a cell and leaves the count alone.
 */
export class Sentence {
  private readonly cellSet: CellSet;
  private mineCount: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this.cellSet = new CellSet(cells);
    if (!Number.isInteger(count) || count < 0 || count > this.cellSet.size) {
      throw new ContradictionError(
        `Cannot have ${count} mines among ${this.cellSet.size} cells ${this.cellSet.toString()}`,
      );
    }
    this.mineCount = count;
  }

  get cells(): ReadonlyCellSet {
    return this.cellSet;
  }

  get count(): number {
    return this.mineCount;
  }

  get size(): number {
    return this.cellSet.size;
  }

  knownMines(): CellSet {
    if (this.mineCount === this.cellSet.size) return new CellSet(this.cellSet);
    return new CellSet();
  }

  knownSafes(): CellSet {
    if (this.mineCount === 0) return new CellSet(this.cellSet);
    return new CellSet();
  }

  /** Returns whether the cell was part of this sentence. */
  markMine(cell: Pos): boolean {
    if (!this.cellSet.delete(cell)) return false;
    this.mineCount--;
    return true;
  }

  markSafe(cell: Pos): boolean {
    return this.cellSet.delete(cell);
  }

  isSubsetOf(other: Sentence): boolean {
    return this.cellSet.isSubsetOf(other.cellSet);
  }

  // Only reachable through in-place marks; the constructor rejects it
  isContradictory(): boolean {
    return this.mineCount < 0 || this.mineCount > this.cellSet.size;
  }

  equals(other: Sentence): boolean {
    return this.mineCount === other.mineCount && this.cellSet.equals(other.cellSet);
  }

  key(): string {
    return `${this.cellSet.key()}=${this.mineCount}`;
  }

  clone(): Sentence {
    return new Sentence(this.cellSet, this.mineCount);
  }

  toString(): string {
    return `${this.cellSet.toString()} = ${this.mineCount}`;
  }
}
