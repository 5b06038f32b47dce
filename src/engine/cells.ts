import type { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function formatPos(pos: Pos): string {
  return `(${pos.row},${pos.col})`;
}

export interface ReadonlyCellSet extends Iterable<Pos> {
  readonly size: number;
  has(pos: Pos): boolean;
  /** Row-major order. */
  sorted(): Pos[];
}

// Set of board positions compared by value rather than by object identity
export class CellSet implements ReadonlyCellSet {
  private readonly byKey = new Map<string, Pos>();

  constructor(cells: Iterable<Pos> = []) {
    for (const cell of cells) this.add(cell);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(pos: Pos): boolean {
    return this.byKey.has(posKey(pos));
  }

  /** Returns false if the cell was already present. */
  add(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.byKey.has(key)) return false;
    this.byKey.set(key, { row: pos.row, col: pos.col });
    return true;
  }

  delete(pos: Pos): boolean {
    return this.byKey.delete(posKey(pos));
  }

  *[Symbol.iterator](): Iterator<Pos> {
    for (const pos of this.byKey.values()) yield { row: pos.row, col: pos.col };
  }

  sorted(): Pos[] {
    return [...this].sort(comparePos);
  }

  isSubsetOf(other: ReadonlyCellSet): boolean {
    if (this.size > other.size) return false;
    for (const pos of this.byKey.values()) {
      if (!other.has(pos)) return false;
    }
    return true;
  }

  equals(other: ReadonlyCellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  difference(other: ReadonlyCellSet): CellSet {
    const out = new CellSet();
    for (const pos of this.byKey.values()) {
      if (!other.has(pos)) out.add(pos);
    }
    return out;
  }

  /** Canonical text form, independent of insertion order. */
  key(): string {
    return this.sorted().map(posKey).join(";");
  }

  toString(): string {
    return `{${this.sorted().map(formatPos).join(", ")}}`;
  }
}
