/**
 * Line rules for the traditional (ncks --trd) metadata dump.
 *
 * One declaration per line:
 *   tmin: type NC_DOUBLE, 3 dimensions, 2 attributes, compressed? no, chunked? no, packed? no
 *   tmin dimension 0: time, size = 365 NC_DOUBLE (Record coordinate is time)
 *   tmin attribute 1: missing_value, size = 1 NC_DOUBLE, value = -9999
 *   time attribute 0: units, size = 21 NC_CHAR, value = days since 2000-01-01
 *
 * All lookups are first-match in dump order and case-insensitive on names.
 */

export interface VariableDeclaration {
  /** True name, as written in the dump. */
  name: string;
  /** NC type token, e.g. NC_DOUBLE. */
  type: string;
  dimensionCount: number;
}

/** Case-folded name → declaration, in declaration order. Built once per probe. */
export type VariableIndex = ReadonlyMap<string, VariableDeclaration>;

export interface DimensionRef {
  ordinal: number;
  name: string;
  size: number;
}

const DECLARATION_RE = /^(\S+):\s+type\s+([^,\s]+),\s+(\d+)\s+dimensions?\b/;
const DIMENSION_RE = /^(\S+)\s+dimension\s+(\d+):\s+([^,\s]+),\s+size\s*=\s*(\d+)/;
const ATTRIBUTE_RE = /^(\S+)\s+attribute\s+(\d+):\s+([^,\s]+),/;
const DAYS_SINCE = " days since ";

function lines(dump: string): string[] {
  return dump.split(/\r?\n/);
}

export function indexVariables(dump: string): VariableIndex {
  const index = new Map<string, VariableDeclaration>();
  for (const line of lines(dump)) {
    const m = DECLARATION_RE.exec(line);
    if (!m) continue;
    const key = m[1].toLowerCase();
    if (index.has(key)) continue;
    index.set(key, { name: m[1], type: m[2], dimensionCount: Number(m[3]) });
  }
  return index;
}

/**
 * Canonical lookup for a user hint: exact case-folded name first,
 * then the first declared name that starts with the case-folded hint.
 */
export function resolveVariable(index: VariableIndex, hint: string): VariableDeclaration | undefined {
  const folded = hint.trim().toLowerCase();
  if (folded === "") return undefined;
  const exact = index.get(folded);
  if (exact) return exact;
  for (const [key, decl] of index) {
    if (key.startsWith(folded)) return decl;
  }
  return undefined;
}

/** Dimension list of one variable, in declared order. */
export function parseDimensions(dump: string, variable: string): DimensionRef[] {
  const dims: DimensionRef[] = [];
  for (const line of lines(dump)) {
    const m = DIMENSION_RE.exec(line);
    if (!m || m[1] !== variable) continue;
    dims.push({ ordinal: Number(m[2]), name: m[3], size: Number(m[4]) });
  }
  return dims.sort((a, b) => a.ordinal - b.ordinal);
}

/** Ordinal of the first dimension whose case-folded name contains needle. */
export function findDimensionOrdinal(dims: readonly DimensionRef[], needle: string): number | undefined {
  return dims.find((d) => d.name.toLowerCase().includes(needle))?.ordinal;
}

/** Last whitespace token of the variable's missing_value attribute line. */
export function parseMissingValue(dump: string, variable: string): number | undefined {
  for (const line of lines(dump)) {
    const m = ATTRIBUTE_RE.exec(line);
    if (!m || m[1] !== variable || m[3] !== "missing_value") continue;
    const tokens = line.trim().split(/\s+/);
    const last = tokens[tokens.length - 1];
    const value = Number(last);
    return Number.isFinite(value) ? value : undefined;
  }
  return undefined;
}

/** Text after the first "days since" units declaration, e.g. "2000-01-01". */
export function parseTimeOrigin(dump: string): string | undefined {
  for (const line of lines(dump)) {
    const at = line.indexOf(DAYS_SINCE);
    if (at === -1) continue;
    const origin = line.slice(at + DAYS_SINCE.length).trim();
    if (origin) return origin;
  }
  return undefined;
}

/** Size of the first dimension declaration named "time" (any case). */
export function parseTimeSize(dump: string): number | undefined {
  for (const line of lines(dump)) {
    const m = DIMENSION_RE.exec(line);
    if (m && m[3].toLowerCase() === "time") return Number(m[4]);
  }
  return undefined;
}

export interface RotatedGrid {
  longitudeName: string;
  latitudeName: string;
}

export type GridCandidates = Partial<RotatedGrid>;

/** First 2-D variables whose names contain "lon" and "lat"; either may be missing. */
export function findRotatedGrid(index: VariableIndex): GridCandidates {
  let longitudeName: string | undefined;
  let latitudeName: string | undefined;
  for (const [key, decl] of index) {
    if (decl.dimensionCount !== 2) continue;
    if (longitudeName == null && key.includes("lon")) longitudeName = decl.name;
    if (latitudeName == null && key.includes("lat")) latitudeName = decl.name;
  }
  return { longitudeName, latitudeName };
}

export function isCompleteGrid(grid: GridCandidates): grid is RotatedGrid {
  return grid.longitudeName != null && grid.latitudeName != null;
}
