// ─── Board, RNG and config tests ────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  Board,
  CellSet,
  ConfigError,
  DEFAULT_CONFIG,
  OutOfBoundsError,
  createRng,
  neighbours,
  pickRandom,
  placeMines,
  resolveGameConfig,
  shuffle,
} from "../src/engine/index";

// ─── RNG determinism ────────────────────────────────────────────────────────

describe("createRng", () => {
  it("produces deterministic sequences", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("different seeds give different sequences", () => {
    const a = createRng(1);
    const b = createRng(2);
    let same = true;
    for (let i = 0; i < 20; i++) {
      if (a() !== b()) same = false;
    }
    expect(same).toBe(false);
  });

  it("stays within [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("shuffle / pickRandom", () => {
  it("shuffle keeps every element", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const out = shuffle([...items], createRng(3));
    expect([...out].sort((a, b) => a - b)).toEqual(items);
  });

  it("pickRandom returns null for an empty list", () => {
    expect(pickRandom([], createRng(1))).toBeNull();
  });

  it("pickRandom clamps a source that returns 1", () => {
    expect(pickRandom(["a", "b", "c"], () => 1)).toBe("c");
  });
});

// ─── Neighbours ─────────────────────────────────────────────────────────────

describe("neighbours", () => {
  it("returns 8 neighbours for a centre cell", () => {
    expect(neighbours(5, 5, 10, 10)).toHaveLength(8);
  });

  it("returns 3 neighbours for a corner cell", () => {
    expect(neighbours(0, 0, 10, 10)).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });

  it("returns 5 neighbours for an edge cell", () => {
    expect(neighbours(0, 5, 10, 10)).toHaveLength(5);
  });

  it("returns nothing on a 1x1 board", () => {
    expect(neighbours(0, 0, 1, 1)).toEqual([]);
  });
});

// ─── Mine placement ─────────────────────────────────────────────────────────

describe("placeMines", () => {
  it("places the requested number of distinct mines", () => {
    const mines = placeMines(10, 10, 30, createRng(42));
    expect(mines).toHaveLength(30);
    expect(new CellSet(mines).size).toBe(30);
  });

  it("is deterministic for the same seed", () => {
    const a = placeMines(8, 8, 20, createRng(777));
    const b = placeMines(8, 8, 20, createRng(777));
    expect(a).toEqual(b);
  });

  it("takes the first cells of a seeded shuffle of the board", () => {
    const all = [
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 0, col: 2 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
      { row: 1, col: 2 },
    ];
    const expected = shuffle(all, createRng(31)).slice(0, 2);
    expect(placeMines(2, 3, 2, createRng(31))).toEqual(expected);
  });

  it("places nothing when no mines are requested", () => {
    expect(placeMines(3, 3, 0, createRng(4))).toEqual([]);
  });

  it("fills the whole board when asked to", () => {
    const mines = placeMines(2, 3, 6, createRng(5));
    expect(new CellSet(mines).size).toBe(6);
  });

  it("Board.random uses the configured mine count", () => {
    const board = Board.random({ height: 5, width: 4, mines: 7 }, createRng(11));
    expect(board.mineCount).toBe(7);
    expect(board.dimensions).toEqual({ height: 5, width: 4 });
  });
});

// ─── Board queries ──────────────────────────────────────────────────────────

describe("Board", () => {
  const board = new Board(3, 3, [
    { row: 0, col: 0 },
    { row: 2, col: 2 },
  ]);

  it("answers isMine", () => {
    expect(board.isMine({ row: 0, col: 0 })).toBe(true);
    expect(board.isMine({ row: 1, col: 1 })).toBe(false);
  });

  it("counts mines in the Moore neighbourhood", () => {
    expect(board.nearbyMineCount({ row: 1, col: 1 })).toBe(2);
    expect(board.nearbyMineCount({ row: 0, col: 1 })).toBe(1);
    expect(board.nearbyMineCount({ row: 2, col: 0 })).toBe(0);
    // the cell itself is not counted
    expect(board.nearbyMineCount({ row: 0, col: 0 })).toBe(0);
  });

  it("won compares flagged cells to the mines as sets", () => {
    expect(board.won([{ row: 2, col: 2 }, { row: 0, col: 0 }])).toBe(true);
    expect(board.won([{ row: 0, col: 0 }])).toBe(false);
    expect(board.won([{ row: 0, col: 0 }, { row: 2, col: 2 }, { row: 1, col: 1 }])).toBe(false);
  });

  it("rejects out-of-bounds queries", () => {
    expect(() => board.isMine({ row: 3, col: 0 })).toThrow(OutOfBoundsError);
    expect(() => board.nearbyMineCount({ row: 0, col: -1 })).toThrow(OutOfBoundsError);
  });

  it("mines snapshot cannot change the board", () => {
    const snapshot = board.mines;
    expect(snapshot.sorted()).toEqual([{ row: 0, col: 0 }, { row: 2, col: 2 }]);
    expect(board.mineCount).toBe(2);
  });

  it("rejects duplicate and out-of-bounds mines", () => {
    try {
      new Board(2, 2, [{ row: 0, col: 0 }, { row: 0, col: 0 }, { row: 5, col: 5 }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          "mines: (0,0) is listed twice",
          "mines: (5,5) is outside the board",
        ]);
      }
    }
  });
});

// ─── Config ─────────────────────────────────────────────────────────────────

describe("resolveGameConfig", () => {
  it("fills in defaults", () => {
    expect(resolveGameConfig({})).toEqual(DEFAULT_CONFIG);
    expect(resolveGameConfig({ height: 4 }).width).toBe(DEFAULT_CONFIG.width);
  });

  it("rejects more mines than cells", () => {
    try {
      resolveGameConfig({ height: 2, width: 2, mines: 5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["mines: cannot place more mines than the board has cells"]);
        expect(err.code).toBe("INVALID_CONFIG");
      }
    }
  });

  it("rejects non-integer dimensions", () => {
    try {
      resolveGameConfig({ width: 2.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith("width: ")).toBe(true);
      }
    }
  });
});
