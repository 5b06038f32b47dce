import { Board } from "./board";
import { formatPos } from "./cells";
import type { ReadonlyCellSet } from "./cells";
import { resolveGameConfig } from "./config";
import { InferenceEngine } from "./inference";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { createRng } from "./rng";
import { GameStatus } from "./types";
import type { GameConfig, Pos, Rng } from "./types";

export interface GameOptions {
  /** Play on this board instead of a random one; it fixes the dimensions and mine count. */
  board?: Board;
  rng?: Rng;
  logger?: Logger;
}

export interface MoveRecord {
  cell: Pos;
  source: "safe" | "random";
  count: number | null; // null when the cell was a mine
  exploded: boolean;
}

/** Plays an inference engine against a hidden board. */
export class Game {
  readonly config: GameConfig;
  readonly board: Board;
  readonly ai: InferenceEngine;
  status: GameStatus = GameStatus.Playing;
  readonly history: MoveRecord[] = [];
  private readonly rng: Rng;
  private readonly logger: Logger;

  constructor(config: Partial<GameConfig> = {}, options: GameOptions = {}) {
    const board = options.board;
    this.config = resolveGameConfig(
      board ? { ...config, height: board.height, width: board.width, mines: board.mineCount } : config,
    );
    this.rng = options.rng ?? createRng(this.config.seed);
    this.logger = options.logger ?? createLogger(this.config.debug);
    this.board = board ?? Board.random(this.config, this.rng);
    this.ai = new InferenceEngine({
      height: this.config.height,
      width: this.config.width,
      logger: this.logger,
      rng: this.rng,
    });
  }

  /** Cells the AI has proven to be mines. */
  get flagged(): ReadonlyCellSet {
    return this.ai.mines;
  }

  /**
   * Make one move: a known-safe cell if there is one, otherwise a random
   * cell that is not a known mine. Returns null once the game is over or
   * nothing is left to play.
   */
  step(): MoveRecord | null {
    if (this.status !== GameStatus.Playing) return null;

    const safe = this.ai.makeSafeMove();
    const cell = safe ?? this.ai.makeRandomMove(this.rng);
    if (!cell) {
      this.checkWin();
      return null;
    }
    const source = safe ? "safe" : "random";

    if (this.board.isMine(cell)) {
      this.status = GameStatus.Lost;
      this.logger.warn(`hit a mine at ${formatPos(cell)} after ${this.history.length} moves`);
      const record: MoveRecord = { cell, source, count: null, exploded: true };
      this.history.push(record);
      return record;
    }

    const count = this.board.nearbyMineCount(cell);
    this.logger.debug(`${source} move ${formatPos(cell)} shows ${count}`);
    this.ai.addKnowledge(cell, count);
    const record: MoveRecord = { cell, source, count, exploded: false };
    this.history.push(record);
    this.checkWin();
    return record;
  }

  play(maxMoves = this.config.height * this.config.width): GameStatus {
    for (let i = 0; i < maxMoves && this.status === GameStatus.Playing; i++) {
      if (!this.step()) break;
    }
    return this.status;
  }

  private checkWin(): void {
    if (this.board.won(this.ai.mines)) {
      this.status = GameStatus.Won;
    }
  }
}
