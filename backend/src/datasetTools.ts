import { NcksTools } from "./ncks.js";
import { NetcdfTools } from "./netcdfDump.js";
import { TOOL_BACKEND, type ToolBackend } from "./settings.js";

/**
 * The external dataset services the pipeline depends on.
 * Both calls are treated as deterministic transformations of the file.
 */
export interface DatasetTools {
  /** Short name used in error messages, e.g. "ncks". */
  readonly name: string;
  /** Traditional textual metadata dump, whole file or one variable. */
  probe(file: string, variable?: string, signal?: AbortSignal): Promise<string>;
  /** One line per scalar value: `dim=idx ... variable=value` label/value token pairs. */
  dumpRecords(file: string, variable: string, signal?: AbortSignal): AsyncIterable<string>;
}

export function createDatasetTools(backend: ToolBackend = TOOL_BACKEND): DatasetTools {
  return backend === "netcdfjs" ? new NetcdfTools() : new NcksTools();
}
