/**
 * Record dump → canonical rows (time, x, y, value), or (time, lon, lat, value) when a
 * rotated-grid coordinate stream is merged in. Each step is a plain function over one line.
 */

import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { requireGridPositions, type ExtractionConfig } from "./configResolver.js";
import type { CoordinatePair, CoordinateStream } from "./coordinateExpander.js";
import type { DatasetTools } from "./datasetTools.js";
import { MalformedConfigError, RecordFormatError, UnsupportedGridError } from "./errors.js";
import { recordLines } from "./metadataProbe.js";
import { tokenizeRecordLine, valueTokenIndex } from "./recordTokens.js";

export { tokenizeRecordLine } from "./recordTokens.js";

/** Raw tokens, copied unchanged from the dump (missing values included). */
export type RecordRow = readonly [time: string, x: string, y: string, value: string];

export interface FieldPositions {
  /** Unset: the time column is left empty. */
  time?: number;
  x: number;
  y: number;
  value: number;
}

const ABORT_CHECK_EVERY = 10_000;
/** Flush CSV output in chunks of about this many characters. */
const CSV_CHUNK_CHARS = 64 * 1024;

export function selectFields(tokens: readonly string[], positions: FieldPositions, lineNumber = 0): RecordRow {
  const pick = (ordinal: number): string => {
    const token: string | undefined = tokens[valueTokenIndex(ordinal)];
    if (token === undefined) {
      throw new RecordFormatError(
        lineNumber,
        `expected at least ${valueTokenIndex(ordinal) + 1} tokens, got ${tokens.length}`
      );
    }
    return token;
  };
  const time = positions.time == null ? "" : pick(positions.time);
  return [time, pick(positions.x), pick(positions.y), pick(positions.value)];
}

export function mergeCoordinates(row: RecordRow, pair: CoordinatePair): RecordRow {
  return [row[0], pair[0], pair[1], row[3]];
}

export function positionsFor(config: ExtractionConfig): FieldPositions {
  const { xPosition, yPosition } = requireGridPositions(config);
  return { time: config.timePosition, x: xPosition, y: yPosition, value: config.varPosition };
}

/** Rows in source order. Blank dump lines are skipped. */
export async function* extractRecords(
  tools: DatasetTools,
  file: string,
  config: ExtractionConfig,
  coordinates?: CoordinateStream,
  signal?: AbortSignal
): AsyncGenerator<RecordRow> {
  const positions = positionsFor(config);
  if (coordinates && positions.time == null) {
    throw new MalformedConfigError("Merging grid coordinates needs the time position", ["tpos"], "extract");
  }
  let lineNumber = 0;
  let rowIndex = 0;
  for await (const line of recordLines(tools, file, config.varDisplayName, "extract", signal)) {
    lineNumber += 1;
    const tokens = tokenizeRecordLine(line);
    if (tokens.length === 0) continue;
    const row = selectFields(tokens, positions, lineNumber);
    if (coordinates) {
      const pair = coordinates.at(rowIndex);
      if (!pair) {
        throw new UnsupportedGridError(
          `record ${rowIndex + 1} has no coordinate pair; the grid supplies ${coordinates.length}`
        );
      }
      yield mergeCoordinates(row, pair);
    } else {
      yield row;
    }
    rowIndex += 1;
    if (rowIndex % ABORT_CHECK_EVERY === 0) signal?.throwIfAborted();
  }
}

export function formatCsvRow(row: RecordRow): string {
  return row.join(",");
}

export interface CsvSummary {
  rowCount: number;
  /** Last lines written, oldest first. */
  tail: string[];
}

/** COPY-ready CSV: no header, one row per line. */
export async function writeRecordsCsv(
  rows: AsyncIterable<RecordRow>,
  path: string,
  tailSize = 10
): Promise<CsvSummary> {
  let rowCount = 0;
  const tail: string[] = [];
  async function* chunks(): AsyncGenerator<string> {
    let buffer = "";
    for await (const row of rows) {
      const line = formatCsvRow(row);
      rowCount += 1;
      if (tailSize > 0) {
        tail.push(line);
        if (tail.length > tailSize) tail.shift();
      }
      buffer += line + "\n";
      if (buffer.length >= CSV_CHUNK_CHARS) {
        yield buffer;
        buffer = "";
      }
    }
    if (buffer) yield buffer;
  }
  await pipeline(Readable.from(chunks()), createWriteStream(path));
  return { rowCount, tail };
}
