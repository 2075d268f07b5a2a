import { z } from "zod";
import { inBoard } from "./board";
import { InvalidConfigError, InvalidObservationError } from "./errors";
import type { BoardSize, Observation } from "./types";

// ─── Solver configuration ───────────────────────────────────────────────────

export const BoardSchema = z.object({
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
});

export const SolverConfigSchema = z
  .object({
    // components with more unknown cells are deferred, not searched
    maxComponentVariables: z.number().int().min(1).max(64).default(24),
    maxSearchNodes: z.number().int().positive().default(2_000_000),
    allowGuess: z.boolean().default(true),
    // omitted = unbounded plane
    board: BoardSchema.optional(),
    totalMines: z.number().int().nonnegative().optional(),
    // skip exact search when reducer decisions / frontier size reaches this
    cspBypassRatio: z.number().positive().optional(),
    emitSweep: z.boolean().default(false),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  })
  .refine((c) => c.totalMines === undefined || c.board !== undefined, {
    message: "totalMines needs a finite board",
    path: ["totalMines"],
  })
  .refine(
    (c) => c.totalMines === undefined || !c.board || c.totalMines <= c.board.rows * c.board.cols,
    { message: "totalMines exceeds the board size", path: ["totalMines"] },
  );

export type SolverConfig = z.infer<typeof SolverConfigSchema>;
export type SolverConfigInput = z.input<typeof SolverConfigSchema>;

export function parseConfig(input: unknown = {}): SolverConfig {
  const result = SolverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

export const DEFAULT_CONFIG: SolverConfig = parseConfig({});

// ─── Observation batches ────────────────────────────────────────────────────

export const RawSymbolSchema = z.enum([
  "unrevealed",
  "number_1",
  "number_2",
  "number_3",
  "number_4",
  "number_5",
  "number_6",
  "number_7",
  "number_8",
  "flag",
  "question",
  "empty",
  "decor",
  "exploded",
]);

export const ObservationSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
  symbol: RawSymbolSchema,
});

export const ObservationBatchSchema = z.array(ObservationSchema);

export function parseObservations(input: unknown, board?: BoardSize): Observation[] {
  const result = ObservationBatchSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidObservationError(formatIssues(result.error));
  }
  for (const obs of result.data) {
    if (!inBoard(obs, board)) {
      throw new InvalidObservationError(`Observation (${obs.row}, ${obs.col}) lies outside the board.`);
    }
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
