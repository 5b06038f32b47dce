export interface Pos {
  row: number;
  col: number;
}

// Returns floats in [0, 1), like Math.random
export type Rng = () => number;

export interface Dimensions {
  height: number;
  width: number;
}

export interface GameConfig extends Dimensions {
  mines: number;
  seed: number;
  debug: boolean; // log marks, derivations and moves to the console
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  height: 8,
  width: 8,
  mines: 8,
  seed: Date.now(),
  debug: false,
};
