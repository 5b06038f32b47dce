import type { ReadonlyCellSet } from "./cells";
import { pickRandom } from "./rng";
import type { Pos, Rng } from "./types";

export interface MoveState {
  readonly height: number;
  readonly width: number;
  readonly movesMade: ReadonlyCellSet;
  readonly safes: ReadonlyCellSet;
  readonly mines: ReadonlyCellSet;
}

// Smallest (row, col) among known-safe cells that have not been played yet
export function selectSafeMove(state: MoveState): Pos | null {
  for (const cell of state.safes.sorted()) {
    if (!state.movesMade.has(cell)) return cell;
  }
  return null;
}

/** Uniform over cells that are neither played nor known mines. */
export function selectRandomMove(state: MoveState, rng: Rng): Pos | null {
  const candidates: Pos[] = [];
  for (let r = 0; r < state.height; r++) {
    for (let c = 0; c < state.width; c++) {
      const p = { row: r, col: c };
      if (!state.movesMade.has(p) && !state.mines.has(p)) candidates.push(p);
    }
  }
  return pickRandom(candidates, rng);
}
