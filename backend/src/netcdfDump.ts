/**
 * In-process dataset tools backed by netcdfjs.
 * Renders the same traditional text layout as ncks so the metadata rules and record
 * extractor work unchanged. NetCDFReader (netcdfjs) supports NetCDF v3 only; NetCDF4/HDF5
 * files need the ncks backend.
 */

import { readFile } from "node:fs/promises";
import { NetCDFReader } from "netcdfjs";
import type { DatasetTools } from "./datasetTools.js";
import { ToolError, type Stage } from "./errors.js";

interface NcAttribute {
  name: string;
  type: string;
  value: unknown;
}

interface NcVariable {
  name: string;
  /** Dimension ids, indexes into the file's dimension list. */
  dimensions: number[];
  attributes: NcAttribute[];
  type: string;
}

interface NcDimension {
  name: string;
  size: number;
}

export interface NetcdfLayout {
  dimensions: NcDimension[];
  variables: NcVariable[];
  globalAttributes: NcAttribute[];
  recordLength: number;
  recordId?: number;
}

const NC_TYPES: Record<string, string> = {
  byte: "NC_BYTE",
  char: "NC_CHAR",
  short: "NC_SHORT",
  int: "NC_INT",
  float: "NC_FLOAT",
  double: "NC_DOUBLE",
};

/** Check for abort every this many records. */
const ABORT_CHECK_EVERY = 10_000;

function ncType(type: string): string {
  return NC_TYPES[type] ?? `NC_${type.toUpperCase()}`;
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) return value.map((v) => formatValue(v)).join(", ");
  return String(value);
}

function valueSize(value: unknown): number {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  return 1;
}

function flatten(data: unknown): unknown[] {
  if (!Array.isArray(data)) return [data];
  // Record variables come back one array per record.
  return data.flatMap((d: unknown) => (Array.isArray(d) ? d : [d]));
}

async function openReader(file: string, stage: Stage): Promise<NetCDFReader> {
  let data: Buffer;
  try {
    data = await readFile(file);
  } catch (error) {
    throw new ToolError(stage, "netcdfjs", `cannot read ${file}`, { cause: error });
  }
  try {
    return new NetCDFReader(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolError(stage, "netcdfjs", `${file} is not a NetCDF-3 file (${reason})`, { cause: error });
  }
}

export function readLayout(reader: NetCDFReader): NetcdfLayout {
  const record = reader.recordDimension as { length: number; id?: number };
  return {
    dimensions: reader.dimensions as NcDimension[],
    variables: reader.variables as NcVariable[],
    globalAttributes: reader.globalAttributes as NcAttribute[],
    recordLength: record.length,
    recordId: record.id,
  };
}

function dimensionSize(layout: NetcdfLayout, id: number): number {
  return id === layout.recordId ? layout.recordLength : layout.dimensions[id].size;
}

/** Metadata block of one variable, ncks --trd -m style. */
export function renderVariable(layout: NetcdfLayout, variable: NcVariable): string[] {
  const out = [
    `${variable.name}: type ${ncType(variable.type)}, ${variable.dimensions.length} dimensions, ` +
      `${variable.attributes.length} attributes, compressed? no, chunked? no, packed? no`,
  ];
  variable.dimensions.forEach((id, ordinal) => {
    const dim = layout.dimensions[id];
    const coord = layout.variables.find((v) => v.name === dim.name && v.dimensions.length === 1);
    const label = id === layout.recordId ? "Record coordinate" : "Coordinate";
    const suffix = coord ? ` ${ncType(coord.type)} (${label} is ${dim.name})` : "";
    out.push(`${variable.name} dimension ${ordinal}: ${dim.name}, size = ${dimensionSize(layout, id)}${suffix}`);
  });
  variable.attributes.forEach((attr, i) => {
    out.push(
      `${variable.name} attribute ${i}: ${attr.name}, size = ${valueSize(attr.value)} ${ncType(attr.type)}, ` +
        `value = ${formatValue(attr.value)}`
    );
  });
  return out;
}

/** Whole-file dump: global attributes, then one block per variable. */
export function renderMetadata(layout: NetcdfLayout): string {
  const blocks: string[][] = [];
  if (layout.globalAttributes.length > 0) {
    blocks.push(
      layout.globalAttributes.map(
        (attr, i) =>
          `Global attribute ${i}: ${attr.name}, size = ${valueSize(attr.value)} ${ncType(attr.type)}, ` +
          `value = ${formatValue(attr.value)}`
      )
    );
  }
  for (const v of layout.variables) blocks.push(renderVariable(layout, v));
  return blocks.map((b) => b.join("\n")).join("\n\n");
}

export class NetcdfTools implements DatasetTools {
  readonly name = "netcdfjs";

  async probe(file: string, variable?: string, signal?: AbortSignal): Promise<string> {
    const reader = await openReader(file, "probe");
    signal?.throwIfAborted();
    const layout = readLayout(reader);
    if (variable == null) return renderMetadata(layout);
    const v = layout.variables.find((x) => x.name === variable);
    if (!v) throw new ToolError("probe", this.name, `variable ${variable} not found in ${file}`);
    return renderVariable(layout, v).join("\n");
  }

  async *dumpRecords(file: string, variable: string, signal?: AbortSignal): AsyncGenerator<string> {
    const reader = await openReader(file, "extract");
    const layout = readLayout(reader);
    const v = layout.variables.find((x) => x.name === variable);
    if (!v) throw new ToolError("extract", this.name, `variable ${variable} not found in ${file}`);
    const names = v.dimensions.map((id) => layout.dimensions[id].name);
    const shape = v.dimensions.map((id) => dimensionSize(layout, id));
    const values = flatten(reader.getDataVariable(variable));
    const index = shape.map(() => 0);
    for (let n = 0; n < values.length; n++) {
      if (n % ABORT_CHECK_EVERY === 0) signal?.throwIfAborted();
      const tokens = names.map((name, i) => `${name}=${index[i]}`);
      tokens.push(`${variable}=${formatValue(values[n])}`);
      yield tokens.join(" ");
      // Row-major: last dimension varies fastest.
      for (let i = shape.length - 1; i >= 0; i--) {
        index[i] += 1;
        if (index[i] < shape[i]) break;
        index[i] = 0;
      }
    }
  }
}
