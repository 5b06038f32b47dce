export { Game } from "./game";
export type { GameOptions, MoveRecord } from "./game";
export { Board, inBounds, neighbours, placeMines } from "./board";
export { CellSet, comparePos, formatPos, posKey } from "./cells";
export type { ReadonlyCellSet } from "./cells";
export { Sentence } from "./sentence";
export { InferenceEngine } from "./inference";
export type { InferenceEngineOptions } from "./inference";
export { selectRandomMove, selectSafeMove } from "./moves";
export type { MoveState } from "./moves";
export { createRng, pickRandom, shuffle } from "./rng";
export { createLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export {
  DimensionsSchema,
  GameConfigSchema,
  resolveDimensions,
  resolveGameConfig,
} from "./config";
export {
  ConfigError,
  ContradictionError,
  EngineError,
  OutOfBoundsError,
} from "./errors";
export type { EngineErrorCode } from "./errors";
export type { Dimensions, GameConfig, Pos, Rng } from "./types";
export { GameStatus, DEFAULT_CONFIG } from "./types";
