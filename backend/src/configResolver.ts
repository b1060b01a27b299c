/**
 * Extraction configuration: read from a `key value` file, or inferred from the
 * dataset's metadata dump and a case-insensitive variable-name hint.
 */

import { readFile } from "node:fs/promises";
import type { DatasetTools } from "./datasetTools.js";
import {
  MalformedConfigError,
  NotFoundError,
  TimeDimensionNotFoundError,
  VariableNotFoundError,
} from "./errors.js";
import { dumpMetadata } from "./metadataProbe.js";
import {
  findDimensionOrdinal,
  findRotatedGrid,
  type GridCandidates,
  indexVariables,
  isCompleteGrid,
  parseDimensions,
  parseMissingValue,
  parseTimeOrigin,
  parseTimeSize,
  resolveVariable,
} from "./metadataRules.js";
import { DEBUG } from "./settings.js";

/**
 * Positions are dimension ordinals (0-based, declared order). The value pair follows
 * the last dimension, so varPosition equals the variable's dimension count.
 */
export interface ExtractionConfig {
  /** Canonical lookup key: the true name, case-folded. */
  readonly varname: string;
  /** True variable name as written in the dataset. */
  readonly varDisplayName: string;
  readonly varPosition: number;
  readonly timePosition?: number;
  readonly xPosition?: number;
  readonly yPosition?: number;
  /** e.g. "2000-01-01" from "days since 2000-01-01". */
  readonly timeOrigin?: string;
  readonly timeSize?: number;
  readonly missingValue?: number;
  /** 2-D coordinate variables of a rotated-pole grid; both set or both absent. */
  readonly longitudeName?: string;
  readonly latitudeName?: string;
}

/** File keys, in the order they are written back. */
const FILE_KEYS = ["varname", "varpos", "tpos", "xpos", "ypos", "tsize", "t1", "missing", "longitude", "latitude"] as const;
type FileKey = (typeof FILE_KEYS)[number];

const REQUIRED_KEYS: readonly FileKey[] = ["varname", "varpos", "xpos", "ypos"];

function isFileKey(key: string): key is FileKey {
  return (FILE_KEYS as readonly string[]).includes(key);
}

function freezeConfig(config: ExtractionConfig): ExtractionConfig {
  return Object.freeze({ ...config });
}

function checkPositions(config: ExtractionConfig, stage: "configure" | "extract" = "configure"): void {
  const positions: Array<[string, number | undefined]> = [
    ["varpos", config.varPosition],
    ["tpos", config.timePosition],
    ["xpos", config.xPosition],
    ["ypos", config.yPosition],
  ];
  const seen = new Map<number, string>();
  for (const [key, value] of positions) {
    if (value == null) continue;
    const other = seen.get(value);
    if (other != null) {
      throw new MalformedConfigError(`${key} and ${other} share position ${value}`, [other, key], stage);
    }
    seen.set(value, key);
  }
}

/** Parse `key value` lines. Blank lines and # comments are skipped; later keys win. */
export function parseConfigText(text: string): ExtractionConfig {
  const raw = new Map<FileKey, string>();
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    const m = /^(\S+)\s*(.*)$/.exec(trimmed);
    if (!m) continue;
    const [, key, value] = m;
    if (!isFileKey(key)) {
      console.warn(`Ignoring unknown config key "${key}"`);
      continue;
    }
    if (value === "") raw.delete(key);
    else raw.set(key, value.trim());
  }

  const missing = REQUIRED_KEYS.filter((k) => !raw.has(k));
  if (missing.length > 0) {
    throw new MalformedConfigError(`Config is missing required keys: ${missing.join(", ")}`, missing);
  }

  const bad: string[] = [];
  const ordinal = (key: FileKey): number | undefined => {
    const v = raw.get(key);
    if (v == null) return undefined;
    if (!/^\d+$/.test(v)) {
      bad.push(key);
      return undefined;
    }
    return Number(v);
  };

  const varname = raw.get("varname") ?? "";
  const varPosition = ordinal("varpos");
  const timePosition = ordinal("tpos");
  const xPosition = ordinal("xpos");
  const yPosition = ordinal("ypos");
  const timeSize = ordinal("tsize");
  if (timeSize === 0) bad.push("tsize");

  let missingValue: number | undefined;
  const missingRaw = raw.get("missing");
  if (missingRaw != null) {
    missingValue = Number(missingRaw);
    if (!Number.isFinite(missingValue)) bad.push("missing");
  }

  const longitudeName = raw.get("longitude");
  const latitudeName = raw.get("latitude");
  if ((longitudeName == null) !== (latitudeName == null)) {
    bad.push(longitudeName == null ? "longitude" : "latitude");
  }

  if (bad.length > 0 || varPosition == null) {
    throw new MalformedConfigError(`Config has invalid values for: ${bad.join(", ")}`, bad);
  }

  const config: ExtractionConfig = {
    varname: varname.toLowerCase(),
    varDisplayName: varname,
    varPosition,
    timePosition,
    xPosition,
    yPosition,
    timeOrigin: raw.get("t1"),
    timeSize,
    missingValue,
    longitudeName,
    latitudeName,
  };
  checkPositions(config);
  return freezeConfig(config);
}

export async function configFromFile(path: string): Promise<ExtractionConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new NotFoundError(path, "configure", { cause: error });
  }
  return parseConfigText(text);
}

/** Inverse of parseConfigText; the output can be saved and passed back with --cfg. */
export function formatConfigText(config: ExtractionConfig): string {
  const values: Record<FileKey, string | number | undefined> = {
    varname: config.varDisplayName,
    varpos: config.varPosition,
    tpos: config.timePosition,
    xpos: config.xPosition,
    ypos: config.yPosition,
    tsize: config.timeSize,
    t1: config.timeOrigin,
    missing: config.missingValue,
    longitude: config.longitudeName,
    latitude: config.latitudeName,
  };
  return FILE_KEYS.filter((k) => values[k] !== undefined)
    .map((k) => `${k} ${values[k]}`)
    .join("\n");
}

export interface InferOptions {
  /** Also look up 2-D longitude/latitude variables of a rotated-pole grid. */
  rotated?: boolean;
  signal?: AbortSignal;
}

export async function inferConfig(
  tools: DatasetTools,
  file: string,
  hint: string,
  options: InferOptions = {}
): Promise<ExtractionConfig> {
  const { rotated = false, signal } = options;
  const fileDump = await dumpMetadata(tools, file, undefined, signal);
  const index = indexVariables(fileDump);
  const decl = resolveVariable(index, hint);
  if (!decl) throw new VariableNotFoundError(hint);

  const varDump = await dumpMetadata(tools, file, decl.name, signal);
  const dims = parseDimensions(varDump, decl.name);

  const timeSize = parseTimeSize(fileDump);
  if (timeSize == null) throw new TimeDimensionNotFoundError();
  if (timeSize === 0) throw new MalformedConfigError("Time dimension has size 0", ["tsize"]);

  let grid: GridCandidates = {};
  if (rotated) {
    const candidates = findRotatedGrid(index);
    if (isCompleteGrid(candidates)) grid = candidates;
    else {
      console.warn(
        "Rotated grid requested but 2-D longitude/latitude variables not both found " +
          `(longitude: ${candidates.longitudeName ?? "none"}, latitude: ${candidates.latitudeName ?? "none"})`
      );
    }
  }

  const config = freezeConfig({
    varname: decl.name.toLowerCase(),
    varDisplayName: decl.name,
    varPosition: dims.length,
    timePosition: findDimensionOrdinal(dims, "time"),
    xPosition: findDimensionOrdinal(dims, "lon"),
    yPosition: findDimensionOrdinal(dims, "lat"),
    timeOrigin: parseTimeOrigin(fileDump),
    timeSize,
    missingValue: parseMissingValue(varDump, decl.name),
    ...grid,
  });
  if (DEBUG) console.log("inferred config:", config);
  return config;
}

/** Position check shared with the extractor, which needs x and y. */
export function requireGridPositions(config: ExtractionConfig): { xPosition: number; yPosition: number } {
  const missing: string[] = [];
  if (config.xPosition == null) missing.push("xpos");
  if (config.yPosition == null) missing.push("ypos");
  if (config.xPosition == null || config.yPosition == null) {
    throw new MalformedConfigError(`Config has no grid position for: ${missing.join(", ")}`, missing, "extract");
  }
  checkPositions(config, "extract");
  return { xPosition: config.xPosition, yPosition: config.yPosition };
}
