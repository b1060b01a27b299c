/**
 * Error kinds raised by the extraction pipeline.
 * Every error records the stage that raised it so the CLI can report where a run failed.
 */

export type Stage = "resolve" | "probe" | "configure" | "expand" | "extract" | "pipeline";

export class ExtractionError extends Error {
  readonly stage: Stage;

  constructor(stage: Stage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** Input path (dataset, archive or config file) does not exist. */
export class NotFoundError extends ExtractionError {
  readonly path: string;

  constructor(path: string, stage: Stage = "resolve", options?: { cause?: unknown }) {
    super(stage, `No such file: ${path}`, options);
    this.path = path;
  }
}

export class NoDatasetInArchiveError extends ExtractionError {
  readonly archive: string;

  constructor(archive: string) {
    super("resolve", `No dataset entry (*.nc) in archive ${archive}`);
    this.archive = archive;
  }
}

export class MalformedConfigError extends ExtractionError {
  /** Keys that were missing or invalid. */
  readonly keys: string[];

  constructor(message: string, keys: string[] = [], stage: Stage = "configure") {
    super(stage, message);
    this.keys = keys;
  }
}

export class VariableNotFoundError extends ExtractionError {
  readonly hint: string;

  constructor(hint: string) {
    super("configure", `No variable matching "${hint}" in dataset metadata`);
    this.hint = hint;
  }
}

export class TimeDimensionNotFoundError extends ExtractionError {
  constructor() {
    super("configure", "No dimension named time in dataset metadata");
  }
}

export class UnsupportedGridError extends ExtractionError {
  constructor(message: string) {
    super("expand", message);
  }
}

/** External tool (ncks, netcdfjs reader) failed or produced unusable output. */
export class ToolError extends ExtractionError {
  readonly tool: string;
  /** Message without the tool prefix. */
  readonly detail: string;

  constructor(stage: Stage, tool: string, detail: string, options?: { cause?: unknown }) {
    super(stage, `${tool}: ${detail}`, options);
    this.tool = tool;
    this.detail = detail;
  }
}

/** A record line has fewer tokens than the configured positions need. */
export class RecordFormatError extends ExtractionError {
  readonly lineNumber: number;

  constructor(lineNumber: number, message: string) {
    super("extract", `record ${lineNumber}: ${message}`);
    this.lineNumber = lineNumber;
  }
}
