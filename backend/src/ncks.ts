/**
 * NCO ncks client. Metadata: `ncks --trd -m [-v var] file`; records: `ncks --trd -H -C -v var file`.
 * Output is streamed line by line so multi-million-row dumps never sit in memory.
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { DatasetTools } from "./datasetTools.js";
import { ToolError, type Stage } from "./errors.js";
import { DEBUG, NCKS_BIN } from "./settings.js";

/** Keep only the end of stderr; ncks prints the useful part last. */
const STDERR_TAIL_CHARS = 2_000;

export function metadataArgs(file: string, variable?: string): string[] {
  return variable ? ["--trd", "-m", "-v", variable, file] : ["--trd", "-m", file];
}

export function recordArgs(file: string, variable: string): string[] {
  return ["--trd", "-H", "-C", "-v", variable, file];
}

export class NcksTools implements DatasetTools {
  readonly name = "ncks";

  constructor(private readonly bin: string = NCKS_BIN) {}

  async probe(file: string, variable?: string, signal?: AbortSignal): Promise<string> {
    const out: string[] = [];
    for await (const line of this.run(metadataArgs(file, variable), "probe", signal)) out.push(line);
    return out.join("\n");
  }

  dumpRecords(file: string, variable: string, signal?: AbortSignal): AsyncIterable<string> {
    return this.run(recordArgs(file, variable), "extract", signal);
  }

  private async *run(args: string[], stage: Stage, signal?: AbortSignal): AsyncGenerator<string> {
    if (DEBUG) console.log(`${this.bin} ${args.join(" ")}`);
    const child = spawn(this.bin, args, { stdio: ["ignore", "pipe", "pipe"], signal });
    let stderr = "";
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_CHARS);
    });
    const rl = createInterface({ input: child.stdout, crlfDelay: Infinity });
    // Resolves on either outcome so a spawn failure is never an unhandled rejection.
    const finished = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once("error", (error) => {
        rl.close();
        resolve({ code: null, error });
      });
      child.once("close", (code) => resolve({ code }));
    });
    try {
      for await (const line of rl) yield line;
      const { code, error } = await finished;
      signal?.throwIfAborted();
      if (error) throw new ToolError(stage, this.name, error.message, { cause: error });
      if (code !== 0) {
        const detail = stderr.trim() || "no error output";
        throw new ToolError(stage, this.name, `exited with code ${code}: ${detail}`);
      }
    } finally {
      rl.close();
      if (child.exitCode === null && child.signalCode === null) child.kill();
    }
  }
}
