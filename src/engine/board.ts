import { CellSet } from "./cells";
import type { ReadonlyCellSet } from "./cells";
import { resolveDimensions } from "./config";
import { ConfigError, OutOfBoundsError } from "./errors";
import { shuffle } from "./rng";
import type { Dimensions, GameConfig, Pos, Rng } from "./types";

const MOORE_DELTAS: ReadonlyArray<{ dr: number; dc: number }> = (() => {
  const deltas: Array<{ dr: number; dc: number }> = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      deltas.push({ dr, dc });
    }
  }
  return deltas;
})();

export function inBounds(pos: Pos, height: number, width: number): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < height &&
    pos.col >= 0 &&
    pos.col < width
  );
}

/** Moore neighbourhood clipped to the grid, row-major, without the cell itself. */
export function neighbours(row: number, col: number, height: number, width: number): Pos[] {
  const result: Pos[] = [];
  for (const { dr, dc } of MOORE_DELTAS) {
    const p = { row: row + dr, col: col + dc };
    if (inBounds(p, height, width)) result.push(p);
  }
  return result;
}

// Uniformly choose `mineCount` distinct cells
export function placeMines(height: number, width: number, mineCount: number, rng: Rng): Pos[] {
  const cells: Pos[] = [];
  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) {
      cells.push({ row: r, col: c });
    }
  }
  return shuffle(cells, rng).slice(0, mineCount);
}

/**
 * The hidden grid. Mine positions are fixed at construction; the board only
 * answers point queries.
 */
export class Board {
  readonly height: number;
  readonly width: number;
  private readonly mineSet: CellSet;

  constructor(height: number, width: number, mines: Iterable<Pos>) {
    const dims = resolveDimensions({ height, width });
    this.height = dims.height;
    this.width = dims.width;
    this.mineSet = new CellSet();

    const issues: string[] = [];
    for (const mine of mines) {
      if (!inBounds(mine, this.height, this.width)) {
        issues.push(`mines: (${mine.row},${mine.col}) is outside the board`);
      } else if (!this.mineSet.add(mine)) {
        issues.push(`mines: (${mine.row},${mine.col}) is listed twice`);
      }
    }
    if (issues.length > 0) throw new ConfigError(issues);
  }

  static random(config: Pick<GameConfig, "height" | "width" | "mines">, rng: Rng): Board {
    return new Board(
      config.height,
      config.width,
      placeMines(config.height, config.width, config.mines, rng),
    );
  }

  get dimensions(): Dimensions {
    return { height: this.height, width: this.width };
  }

  get mineCount(): number {
    return this.mineSet.size;
  }

  get mines(): ReadonlyCellSet {
    return new CellSet(this.mineSet);
  }

  contains(cell: Pos): boolean {
    return inBounds(cell, this.height, this.width);
  }

  isMine(cell: Pos): boolean {
    this.assertInBounds(cell);
    return this.mineSet.has(cell);
  }

  nearbyMineCount(cell: Pos): number {
    this.assertInBounds(cell);
    let count = 0;
    for (const n of neighbours(cell.row, cell.col, this.height, this.width)) {
      if (this.mineSet.has(n)) count++;
    }
    return count;
  }

  /** True iff the flagged cells are exactly the mines. */
  won(flagged: Iterable<Pos>): boolean {
    return this.mineSet.equals(new CellSet(flagged));
  }

  private assertInBounds(cell: Pos): void {
    if (!this.contains(cell)) throw new OutOfBoundsError(cell, this.height, this.width);
  }
}
