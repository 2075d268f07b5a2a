// ─── Configuration, validation and logging ──────────────────────────────────

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  DEFAULT_CONFIG,
  InvalidConfigError,
  InvalidObservationError,
  Session,
  createConsoleLogger,
  parseConfig,
  parseObservations,
} from "../src/engine/index";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(DEFAULT_CONFIG).toEqual({
      maxComponentVariables: 24,
      maxSearchNodes: 2_000_000,
      allowGuess: true,
      emitSweep: false,
      logLevel: "warn",
    });
  });

  it("keeps explicit values", () => {
    const config = parseConfig({ board: { rows: 9, cols: 9 }, totalMines: 10, cspBypassRatio: 0.5 });
    expect(config.board).toEqual({ rows: 9, cols: 9 });
    expect(config.totalMines).toBe(10);
    expect(config.cspBypassRatio).toBe(0.5);
  });

  it("rejects a mine budget without a board", () => {
    expect(() => parseConfig({ totalMines: 10 })).toThrow(InvalidConfigError);
  });

  it("rejects out-of-range limits", () => {
    expect(() => parseConfig({ maxComponentVariables: 0 })).toThrow(InvalidConfigError);
    expect(() => parseConfig({ board: { rows: 2, cols: 2 }, totalMines: 5 })).toThrow(InvalidConfigError);
  });

  it("is applied by the session constructor", () => {
    expect(() => new Session({ maxSearchNodes: -1 })).toThrow(InvalidConfigError);
  });
});

describe("parseObservations", () => {
  it("accepts a well-formed batch", () => {
    const batch = [{ row: 1, col: 2, symbol: "number_3" }];
    expect(parseObservations(batch)).toEqual(batch);
  });

  it("rejects unknown symbols", () => {
    expect(() => parseObservations([{ row: 0, col: 0, symbol: "number_9" }])).toThrow(InvalidObservationError);
  });

  it("rejects cells outside the board", () => {
    expect(() => parseObservations([{ row: 3, col: 0, symbol: "empty" }], { rows: 3, cols: 3 })).toThrow(
      InvalidObservationError,
    );
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and drops those below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = createConsoleLogger("info");

    logger.info("cycle done");
    logger.debug("noise");

    expect(info).toHaveBeenCalledWith("[sweeper-brain] cycle done");
    expect(debug).not.toHaveBeenCalled();
  });
});
