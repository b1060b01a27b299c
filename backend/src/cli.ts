#!/usr/bin/env node
/**
 * coldgrid: locate low-temperature land areas from NetCDF minimum-temperature grids.
 *   coldgrid explain <source> [--tar]
 *   coldgrid build <source> <destination> [--tar] [--rotated] [--cfg <path>] [--varname <name>]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { formatConfigText } from "./configResolver.js";
import type { DatasetTools } from "./datasetTools.js";
import { ExtractionError } from "./errors.js";
import { explainDataset, runExtraction } from "./pipeline.js";

export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliDeps {
  tools?: DatasetTools;
  workspaceRoot?: string;
  signal?: AbortSignal;
}

/** Report the innermost failure once; returns the process exit code. */
export function reportFailure(error: unknown, signal?: AbortSignal): number {
  if (signal?.aborted) {
    console.error("coldgrid: interrupted");
    return EXIT_INTERRUPTED;
  }
  if (error instanceof ExtractionError) {
    console.error(`coldgrid: ${error.stage} failed: ${error.message}`);
  } else {
    console.error("coldgrid: unexpected failure:", error);
  }
  return EXIT_FAILURE;
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();
  program
    .name("coldgrid")
    .description("Write NetCDF minimum-temperature grids to PostgreSQL COPY files")
    .version("0.1.0");

  program
    .command("explain")
    .description("Print dimensions and variables in the input NetCDF file")
    .argument("<source>", "input NetCDF filename (or tar archive if --tar is given)")
    .option("-t, --tar", "read the first NetCDF in the input tar archive")
    .action(async (source: string, opts: { tar?: boolean }) => {
      const dump = await explainDataset({ source, archive: opts.tar, ...deps });
      console.log(dump);
    });

  program
    .command("build")
    .description("Write NetCDF temperature data to a PostgreSQL COPY file")
    .argument("<source>", "input NetCDF filename (or tar archive if --tar is given)")
    .argument("<destination>", "output COPY filename")
    .option("-t, --tar", "input file is a tar archive that contains NetCDF files")
    .option("-r, --rotated", "longitude and latitude refer to a rotated pole grid")
    .option("-c, --cfg <path>", "use configuration file")
    .option("-v, --varname <name>", "name of the variable that holds minimum temperature values")
    .action(
      async (
        source: string,
        destination: string,
        opts: { tar?: boolean; rotated?: boolean; cfg?: string; varname?: string }
      ) => {
        const result = await runExtraction({
          source,
          destination,
          archive: opts.tar,
          rotated: opts.rotated,
          configFile: opts.cfg,
          varname: opts.varname,
          ...deps,
        });
        console.log(formatConfigText(result.config));
        console.log(`Wrote ${result.rowCount} rows -> ${result.destination}`);
        for (const line of result.tail) console.log(line);
      }
    );

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  try {
    await createProgram({ signal: controller.signal }).parseAsync(argv);
    return 0;
  } catch (error) {
    return reportFailure(error, controller.signal);
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then((code) => {
    process.exitCode = code;
  });
}
