/**
 * Orchestrator: resolve dataset → configure → (rotated grids) expand coordinates → extract.
 * One workspace per run, removed on every exit path. Errors propagate untouched.
 */

import { rename, rm } from "node:fs/promises";
import { resolve } from "node:path";
import { resolveDataset } from "./archiveResolver.js";
import { configFromFile, inferConfig, type ExtractionConfig } from "./configResolver.js";
import { expandCoordinates } from "./coordinateExpander.js";
import { createDatasetTools, type DatasetTools } from "./datasetTools.js";
import { MalformedConfigError } from "./errors.js";
import { dumpMetadata } from "./metadataProbe.js";
import { extractRecords, writeRecordsCsv } from "./recordExtractor.js";
import { DEBUG, WORKSPACE_ROOT } from "./settings.js";
import { withWorkspace } from "./workspace.js";

export type { ExtractionConfig } from "./configResolver.js";
export type { DatasetTools } from "./datasetTools.js";

interface SourceOptions {
  /** Dataset path, archive path, or http(s) URL. */
  source: string;
  /** Source is a tar archive; the first `*.nc` entry is used. */
  archive?: boolean;
  tools?: DatasetTools;
  workspaceRoot?: string;
  signal?: AbortSignal;
}

export interface ExtractionOptions extends SourceOptions {
  /** Output CSV path. */
  destination: string;
  /** 2-D longitude/latitude variables replace grid indexes (inference mode). */
  rotated?: boolean;
  /** `key value` config file; wins over varname. */
  configFile?: string;
  /** Case-insensitive name (or prefix) of the minimum-temperature variable. */
  varname?: string;
  /** Output lines kept for the summary. */
  tailSize?: number;
}

export interface ExtractionResult {
  config: ExtractionConfig;
  /** Dataset actually read; inside the workspace for archives, already removed on return. */
  datasetFile: string;
  destination: string;
  rowCount: number;
  tail: string[];
}

export async function runExtraction(options: ExtractionOptions): Promise<ExtractionResult> {
  const { configFile, varname, signal } = options;
  if (!configFile && !varname) {
    throw new MalformedConfigError(
      "Provide a configuration file (--cfg) or the minimum temperature variable name (--varname)",
      ["cfg", "varname"],
      "pipeline"
    );
  }
  if (configFile && varname) console.warn(`Using ${configFile}; --varname ${varname} is ignored`);
  const tools = options.tools ?? createDatasetTools();
  const destination = resolve(options.destination);
  const partial = `${destination}.part`;

  return withWorkspace(options.workspaceRoot ?? WORKSPACE_ROOT, async (workspace) => {
    signal?.throwIfAborted();
    const datasetFile = await resolveDataset(options.source, options.archive ?? false, workspace, signal);

    signal?.throwIfAborted();
    const config = configFile
      ? await configFromFile(configFile)
      : await inferConfig(tools, datasetFile, varname ?? "", { rotated: options.rotated, signal });

    signal?.throwIfAborted();
    const coordinates =
      config.longitudeName && config.latitudeName
        ? await expandCoordinates(tools, datasetFile, config, signal)
        : undefined;
    if (DEBUG && coordinates) {
      console.log(`coordinate stream: ${coordinates.cellCount} cells x ${coordinates.steps} steps`);
    }

    signal?.throwIfAborted();
    try {
      const rows = extractRecords(tools, datasetFile, config, coordinates, signal);
      const { rowCount, tail } = await writeRecordsCsv(rows, partial, options.tailSize);
      await rename(partial, destination);
      return { config, datasetFile, destination, rowCount, tail };
    } catch (error) {
      await rm(partial, { force: true });
      throw error;
    }
  });
}

/** Whole-file metadata dump of the resolved dataset. */
export async function explainDataset(options: SourceOptions): Promise<string> {
  const tools = options.tools ?? createDatasetTools();
  return withWorkspace(options.workspaceRoot ?? WORKSPACE_ROOT, async (workspace) => {
    const datasetFile = await resolveDataset(options.source, options.archive ?? false, workspace, options.signal);
    return dumpMetadata(tools, datasetFile, undefined, options.signal);
  });
}
