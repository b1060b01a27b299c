/**
 * Rotated-pole grids store longitude/latitude as 2-D variables. Pair them per cell and
 * repeat the cell list once per time step, matching the (time, y, x) order of the record dump.
 */

import type { ExtractionConfig } from "./configResolver.js";
import type { DatasetTools } from "./datasetTools.js";
import { MalformedConfigError, UnsupportedGridError } from "./errors.js";
import { recordLines } from "./metadataProbe.js";
import { tokenizeRecordLine } from "./recordTokens.js";

/** [longitude, latitude], raw dump tokens. */
export type CoordinatePair = readonly [string, string];

/** cells × steps pairs; index k is the pair of cell k mod cells. Computed on access. */
export class CoordinateStream implements Iterable<CoordinatePair> {
  constructor(
    private readonly cells: readonly CoordinatePair[],
    readonly steps: number
  ) {}

  get cellCount(): number {
    return this.cells.length;
  }

  get length(): number {
    return this.cells.length * this.steps;
  }

  at(index: number): CoordinatePair | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined;
    return this.cells[index % this.cells.length];
  }

  *[Symbol.iterator](): Iterator<CoordinatePair> {
    for (let step = 0; step < this.steps; step++) yield* this.cells;
  }
}

/** Last value token of each record line of one variable, in dump order. */
export async function readValueColumn(
  tools: DatasetTools,
  file: string,
  variable: string,
  signal?: AbortSignal
): Promise<string[]> {
  const values: string[] = [];
  for await (const line of recordLines(tools, file, variable, "expand", signal)) {
    const tokens = tokenizeRecordLine(line);
    if (tokens.length === 0) continue;
    values.push(tokens[tokens.length - 1]);
  }
  return values;
}

export async function expandCoordinates(
  tools: DatasetTools,
  file: string,
  config: ExtractionConfig,
  signal?: AbortSignal
): Promise<CoordinateStream> {
  const { longitudeName, latitudeName, timeSize } = config;
  if (!longitudeName || !latitudeName) {
    throw new UnsupportedGridError("Coordinate expansion needs 2-D longitude and latitude variables (rotated-pole grid)");
  }
  if (timeSize == null) {
    throw new MalformedConfigError("Coordinate expansion needs the time dimension size", ["tsize"], "expand");
  }
  const lon = await readValueColumn(tools, file, longitudeName, signal);
  const lat = await readValueColumn(tools, file, latitudeName, signal);
  if (lon.length !== lat.length) {
    throw new UnsupportedGridError(
      `${longitudeName} has ${lon.length} cells but ${latitudeName} has ${lat.length}`
    );
  }
  const cells = lon.map((x, i): CoordinatePair => [x, lat[i]]);
  return new CoordinateStream(cells, timeSize);
}
