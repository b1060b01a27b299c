import type { DatasetTools } from "./datasetTools.js";
import { ExtractionError, ToolError, type Stage } from "./errors.js";

/** ToolErrors are re-tagged with the calling stage. */
function rewrap(tools: DatasetTools, stage: Stage, error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted) return error;
  if (error instanceof ToolError) {
    return error.stage === stage ? error : new ToolError(stage, error.tool, error.detail, { cause: error });
  }
  if (error instanceof ExtractionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ToolError(stage, tools.name, message, { cause: error });
}

/** Raw metadata dump of the whole file, or of one variable. No parsing here. */
export async function dumpMetadata(
  tools: DatasetTools,
  file: string,
  variable?: string,
  signal?: AbortSignal
): Promise<string> {
  try {
    return await tools.probe(file, variable, signal);
  } catch (error) {
    throw rewrap(tools, "probe", error, signal);
  }
}

/** Record dump lines of one variable; failures surface as ToolError of the given stage. */
export async function* recordLines(
  tools: DatasetTools,
  file: string,
  variable: string,
  stage: Stage,
  signal?: AbortSignal
): AsyncGenerator<string> {
  try {
    for await (const line of tools.dumpRecords(file, variable, signal)) yield line;
  } catch (error) {
    throw rewrap(tools, stage, error, signal);
  }
}
