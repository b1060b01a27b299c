import { tmpdir } from "node:os";

/**
 * Runtime settings, read once from the environment.
 * COLDGRID_BACKEND=netcdfjs reads NetCDF-3 files in process; default spawns ncks (NCO).
 */

export type ToolBackend = "ncks" | "netcdfjs";

function parseBackend(raw: string | undefined): ToolBackend {
  if (raw == null || raw === "") return "ncks";
  const v = raw.trim().toLowerCase();
  if (v === "ncks" || v === "netcdfjs") return v;
  throw new Error(`COLDGRID_BACKEND must be "ncks" or "netcdfjs", got "${raw}"`);
}

export const TOOL_BACKEND: ToolBackend = parseBackend(process.env.COLDGRID_BACKEND);

/** ncks binary; override when NCO is not on PATH. */
export const NCKS_BIN = process.env.COLDGRID_NCKS || "ncks";

/** Parent directory for per-run workspaces. */
export const WORKSPACE_ROOT = process.env.COLDGRID_TMPDIR || tmpdir();

export const DEBUG = process.env.DEBUG_COLDGRID === "1" || process.env.DEBUG_COLDGRID === "true";

/** Archive entries treated as datasets (tar --wildcards "*.nc"). */
export const DATASET_PATTERN = /\.nc$/i;

/** Remote datasets can be large; allow a slow server 10 minutes. */
export const DOWNLOAD_TIMEOUT_MS = 10 * 60_000;
