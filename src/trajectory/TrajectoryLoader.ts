/**
 * TrajectoryLoader - Reads experimental (t, x, y) tables
 *
 * Expects a header row naming the columns `t` (or `time`), `x` and `y`,
 * in seconds and metres. Extra columns are ignored.
 */

import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import { MalformedInputError } from "@/errors/SimulationError";
import type { TimeSeriesInput, Trajectory } from "@/types";
import { TrajectoryBuilder } from "./TrajectoryBuilder";

type CsvRow = Record<string, string | undefined>;

const COLUMN_ALIASES = {
  t: ["t", "time"],
  x: ["x"],
  y: ["y"],
} as const;

type Column = keyof typeof COLUMN_ALIASES;

/**
 * Parse CSV text into column arrays.
 */
export function parseTimeSeriesCsv(text: string): TimeSeriesInput {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  // Delimiter guessing fails on single-column files; the column check reports those
  const rowError = result.errors.find((e) => e.type !== "Delimiter");
  if (rowError) {
    const row = rowError.row === undefined ? "" : ` (data row ${rowError.row + 1})`;
    throw new MalformedInputError(`CSV parse error${row}: ${rowError.message}`);
  }

  const fields = result.meta.fields ?? [];
  const names = {
    t: findColumn(fields, "t"),
    x: findColumn(fields, "x"),
    y: findColumn(fields, "y"),
  };

  const series: { t: number[]; x: number[]; y: number[] } = { t: [], x: [], y: [] };
  result.data.forEach((row, index) => {
    for (const column of ["t", "x", "y"] as const) {
      series[column].push(parseCell(row[names[column]], names[column], index));
    }
  });

  return series;
}

/**
 * Parse CSV text into an experimental trajectory.
 */
export function parseTrajectoryCsv(text: string): Trajectory {
  return TrajectoryBuilder.fromSeries(parseTimeSeriesCsv(text));
}

/**
 * Read a CSV file into an experimental trajectory.
 */
export async function loadTrajectoryCsv(path: string): Promise<Trajectory> {
  const text = await readFile(path, "utf8");
  return parseTrajectoryCsv(text);
}

function findColumn(fields: readonly string[], column: Column): string {
  const aliases: readonly string[] = COLUMN_ALIASES[column];
  const name = fields.find((field) => aliases.includes(field));
  if (name === undefined) {
    throw new MalformedInputError(
      `Missing required column "${column}" (accepted names: ${aliases.join(", ")})`
    );
  }
  return name;
}

function parseCell(cell: string | undefined, column: string, index: number): number {
  const text = cell?.trim() ?? "";
  const value = text === "" ? Number.NaN : Number(text);
  if (!Number.isFinite(value)) {
    throw new MalformedInputError(
      `Column "${column}" data row ${index + 1}: "${text}" is not a finite number`
    );
  }
  return value;
}
