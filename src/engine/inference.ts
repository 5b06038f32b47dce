import { inBounds, neighbours } from "./board";
import { CellSet, formatPos } from "./cells";
import type { ReadonlyCellSet } from "./cells";
import { resolveDimensions } from "./config";
import { ContradictionError, EngineError, OutOfBoundsError } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { selectRandomMove, selectSafeMove } from "./moves";
import type { MoveState } from "./moves";
import { createRng } from "./rng";
import { Sentence } from "./sentence";
import type { Dimensions, Pos, Rng } from "./types";

export interface InferenceEngineOptions extends Dimensions {
  logger?: Logger;
  rng?: Rng;
}

/**
 * Knowledge base for a single game.
 *
 * Invariants after every public call:
 * - safes and mines are disjoint, and movesMade is a subset of safes
 * - no sentence mentions a resolved cell
 * - no two sentences are equal
 */
export class InferenceEngine {
  readonly height: number;
  readonly width: number;
  private readonly movesMadeSet = new CellSet();
  private readonly safeSet = new CellSet();
  private readonly mineSet = new CellSet();
  private sentences: Sentence[] = [];
  private readonly logger: Logger;
  private readonly rng: Rng;

  constructor(options: InferenceEngineOptions) {
    const dims = resolveDimensions({ height: options.height, width: options.width });
    this.height = dims.height;
    this.width = dims.width;
    this.logger = options.logger ?? silentLogger;
    this.rng = options.rng ?? createRng(Date.now());
  }

  get movesMade(): ReadonlyCellSet {
    return new CellSet(this.movesMadeSet);
  }

  get safes(): ReadonlyCellSet {
    return new CellSet(this.safeSet);
  }

  get mines(): ReadonlyCellSet {
    return new CellSet(this.mineSet);
  }

  get knowledge(): Sentence[] {
    return this.sentences.map((s) => s.clone());
  }

  markMine(cell: Pos): void {
    this.assertInBounds(cell);
    this.applyMine(cell);
    this.cleanUp();
  }

  markSafe(cell: Pos): void {
    this.assertInBounds(cell);
    this.applySafe(cell);
    this.cleanUp();
  }

  /**
   * Record that `cell` was revealed with `count` mines around it, then run
   * inference until nothing new follows.
   */
  addKnowledge(cell: Pos, count: number): void {
    this.assertInBounds(cell);
    const around = neighbours(cell.row, cell.col, this.height, this.width);
    if (!Number.isInteger(count) || count < 0 || count > around.length) {
      throw new EngineError(
        `Cell ${formatPos(cell)} cannot have ${count} neighbouring mines`,
        "INVALID_COUNT",
      );
    }

    if (this.mineSet.has(cell)) {
      throw new ContradictionError(`Cell ${formatPos(cell)} is a known mine and cannot be revealed`);
    }

    // Mines already known still count toward the revealed number
    let knownMinesAround = 0;
    const unresolved: Pos[] = [];
    for (const n of around) {
      if (this.mineSet.has(n)) knownMinesAround++;
      else if (!this.safeSet.has(n)) unresolved.push(n);
    }
    const remaining = count - knownMinesAround;

    // Validate before touching any state; the cell is never its own neighbour
    let sentence: Sentence | null = null;
    if (unresolved.length > 0) {
      sentence = new Sentence(unresolved, remaining);
    } else if (remaining !== 0) {
      throw new ContradictionError(
        `Cell ${formatPos(cell)} reports ${count} mines but ${knownMinesAround} are known and none remain unresolved`,
      );
    }

    this.movesMadeSet.add(cell);
    this.applySafe(cell);
    if (sentence) this.addSentence(sentence);

    this.infer();
  }

  /**
   * Fixpoint loop. Each pass runs direct resolution, then subset resolution,
   * then clean-up, and the loop stops after a pass that changes nothing.
   *
   * Clean-up keeps zero-count sentences that still hold cells: subset
   * resolution can derive one after this pass's direct resolution already ran,
   * and its cells are only marked safe on the next pass.
   *
   * Returns whether anything changed.
   */
  infer(): boolean {
    let changed = false;
    for (let pass = 1; ; pass++) {
      const marked = this.resolveDirect();
      const derived = this.resolveSubsets();
      const dropped = this.cleanUp();
      if (marked + derived + dropped === 0) break;
      changed = true;
      this.logger.debug(
        `pass ${pass}: ${marked} marked, ${derived} derived, ${dropped} dropped, ${this.sentences.length} sentences`,
      );
    }
    return changed;
  }

  makeSafeMove(): Pos | null {
    return selectSafeMove(this.moveState());
  }

  makeRandomMove(rng: Rng = this.rng): Pos | null {
    return selectRandomMove(this.moveState(), rng);
  }

  private moveState(): MoveState {
    return {
      height: this.height,
      width: this.width,
      movesMade: this.movesMadeSet,
      safes: this.safeSet,
      mines: this.mineSet,
    };
  }

  private resolveDirect(): number {
    const mines = new CellSet();
    const safes = new CellSet();
    for (const sentence of this.sentences) {
      for (const cell of sentence.knownMines()) {
        if (!this.mineSet.has(cell)) mines.add(cell);
      }
      for (const cell of sentence.knownSafes()) {
        if (!this.safeSet.has(cell)) safes.add(cell);
      }
    }

    for (const cell of mines) {
      if (safes.has(cell)) {
        throw new ContradictionError(`Cell ${formatPos(cell)} is implied to be both a mine and safe`);
      }
    }

    for (const cell of mines) this.applyMine(cell);
    for (const cell of safes) this.applySafe(cell);
    return mines.size + safes.size;
  }

  private resolveSubsets(): number {
    const additions: Sentence[] = [];
    const seen = new Set(this.sentences.map((s) => s.key()));

    for (const subset of this.sentences) {
      for (const superset of this.sentences) {
        if (subset === superset || !subset.isSubsetOf(superset)) continue;

        const cells = superset.cells.sorted().filter((c) => !subset.cells.has(c));
        const count = superset.count - subset.count;
        if (count < 0 || cells.length === 0) continue;

        // Throws when the difference holds more mines than cells
        const candidate = new Sentence(cells, count);
        const key = candidate.key();
        if (seen.has(key)) continue;
        seen.add(key);
        additions.push(candidate);
        this.logger.debug(`derived ${candidate.toString()} from ${superset.toString()} - ${subset.toString()}`);
      }
    }

    this.sentences.push(...additions);
    return additions.length;
  }

  // Drops emptied and duplicate sentences; returns how many were dropped
  private cleanUp(): number {
    const kept: Sentence[] = [];
    const seen = new Set<string>();
    for (const sentence of this.sentences) {
      if (sentence.isContradictory()) {
        throw new ContradictionError(`Knowledge became contradictory: ${sentence.toString()}`);
      }
      if (sentence.size === 0) continue;
      const key = sentence.key();
      if (seen.has(key)) continue;
      seen.add(key);
      kept.push(sentence);
    }

    const dropped = this.sentences.length - kept.length;
    this.sentences = kept;
    return dropped;
  }

  private addSentence(sentence: Sentence): boolean {
    if (this.sentences.some((s) => s.equals(sentence))) return false;
    this.sentences.push(sentence);
    this.logger.debug(`learned ${sentence.toString()}`);
    return true;
  }

  private applyMine(cell: Pos): void {
    if (this.safeSet.has(cell)) {
      throw new ContradictionError(`Cell ${formatPos(cell)} is known safe and cannot be a mine`);
    }
    if (!this.mineSet.add(cell)) return;
    this.logger.debug(`mine ${formatPos(cell)}`);
    for (const sentence of this.sentences) sentence.markMine(cell);
  }

  private applySafe(cell: Pos): void {
    if (this.mineSet.has(cell)) {
      throw new ContradictionError(`Cell ${formatPos(cell)} is a known mine and cannot be safe`);
    }
    if (!this.safeSet.add(cell)) return;
    this.logger.debug(`safe ${formatPos(cell)}`);
    for (const sentence of this.sentences) sentence.markSafe(cell);
  }

  private assertInBounds(cell: Pos): void {
    if (!inBounds(cell, this.height, this.width)) {
      throw new OutOfBoundsError(cell, this.height, this.width);
    }
  }
}
