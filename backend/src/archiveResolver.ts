/**
 * Input resolution: local file, tar archive holding datasets, or a dataset served over HTTP.
 * Anything extracted or downloaded lands in the run's workspace.
 */

import { createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios from "axios";
import { extract, list } from "tar";
import { NoDatasetInArchiveError, NotFoundError, ToolError } from "./errors.js";
import { DATASET_PATTERN, DEBUG, DOWNLOAD_TIMEOUT_MS } from "./settings.js";
import type { Workspace } from "./workspace.js";

export function isDatasetEntry(name: string): boolean {
  return DATASET_PATTERN.test(name);
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/** Absolute path of an existing regular file, or NotFoundError. */
export async function requireFile(path: string): Promise<string> {
  const absolute = resolve(path);
  try {
    const info = await stat(absolute);
    if (info.isFile()) return absolute;
  } catch (error) {
    throw new NotFoundError(path, "resolve", { cause: error });
  }
  throw new NotFoundError(path);
}

/** Entry names in archive order (gzip detected automatically). */
export async function listArchiveEntries(archive: string): Promise<string[]> {
  const names: string[] = [];
  try {
    await list({
      file: archive,
      onReadEntry: (entry) => {
        names.push(entry.path);
      },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolError("resolve", "tar", `cannot list ${archive}: ${reason}`, { cause: error });
  }
  return names;
}

export async function listDatasetEntries(archive: string): Promise<string[]> {
  return (await listArchiveEntries(archive)).filter(isDatasetEntry);
}

/** Extract the first dataset entry into the workspace and return its path. */
export async function extractFirstDataset(archive: string, workspace: Workspace): Promise<string> {
  const [entry, ...rest] = await listDatasetEntries(archive);
  if (entry == null) throw new NoDatasetInArchiveError(archive);
  if (rest.length > 0) {
    console.warn(`Archive ${basename(archive)} holds ${rest.length + 1} datasets; extracting ${entry} only`);
  }
  try {
    await extract({ file: archive, cwd: workspace.dir }, [entry]);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolError("resolve", "tar", `cannot extract ${entry}: ${reason}`, { cause: error });
  }
  if (DEBUG) console.log(`extracted ${entry} from ${archive}`);
  // tar strips leading "/" from entry names on extraction.
  return requireFile(workspace.path(entry.replace(/^\/+/, "")));
}

/** Stream a remote dataset or archive into the workspace. */
export async function downloadSource(url: string, workspace: Workspace, signal?: AbortSignal): Promise<string> {
  const name = basename(new URL(url).pathname) || "download";
  const dest = workspace.path(name);
  try {
    const response = await axios.get<Readable>(url, {
      responseType: "stream",
      timeout: DOWNLOAD_TIMEOUT_MS,
      signal,
      validateStatus: (status) => status === 200,
    });
    await pipeline(response.data, createWriteStream(dest));
  } catch (error) {
    signal?.throwIfAborted();
    if (axios.isAxiosError(error) && error.response?.status === 404) {
      throw new NotFoundError(url, "resolve", { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolError("resolve", "download", `${url}: ${reason}`, { cause: error });
  }
  if (DEBUG) console.log(`downloaded ${url} -> ${dest}`);
  return dest;
}

/**
 * Path of the dataset to read: the input itself, or the first `*.nc` entry of an archive
 * extracted into the workspace.
 */
export async function resolveDataset(
  source: string,
  isArchive: boolean,
  workspace: Workspace,
  signal?: AbortSignal
): Promise<string> {
  const local = isRemoteSource(source) ? await downloadSource(source, workspace, signal) : source;
  const path = await requireFile(local);
  if (!isArchive) return path;
  return extractFirstDataset(path, workspace);
}
