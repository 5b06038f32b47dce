import type { Pos } from "./types";

export type EngineErrorCode =
  | "CONTRADICTION"
  | "OUT_OF_BOUNDS"
  | "INVALID_CONFIG"
  | "INVALID_COUNT";

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/** The knowledge base no longer admits any mine layout. */
export class ContradictionError extends EngineError {
  constructor(message: string) {
    super(message, "CONTRADICTION");
    this.name = "ContradictionError";
  }
}

export class OutOfBoundsError extends EngineError {
  constructor(
    public readonly cell: Pos,
    height: number,
    width: number,
  ) {
    super(`Cell (${cell.row},${cell.col}) is outside the ${height}x${width} board`, "OUT_OF_BOUNDS");
    this.name = "OutOfBoundsError";
  }
}

export class ConfigError extends EngineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}
