import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { create } from "tar";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetcdfTools } from "../src/netcdfDump.js";
import { explainDataset, runExtraction } from "../src/pipeline.js";
import { FakeDatasetTools, fixture, gridLines, rotatedDataset, tminDataset } from "./helpers/fakeTools.js";
import { encodeNetcdf3, SMALL_GRID } from "./helpers/netcdf3.js";

const CONFIG_FILE = fileURLToPath(new URL("./fixtures/tmin.cfg", import.meta.url));

let scratch: string;
let workspaceRoot: string;
let dataset: string;

beforeEach(async () => {
  scratch = await mkdtemp(join(tmpdir(), "coldgrid-run-"));
  workspaceRoot = join(scratch, "work");
  await mkdir(workspaceRoot);
  dataset = join(scratch, "grid.nc");
  await writeFile(dataset, "placeholder");
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(scratch, { recursive: true, force: true });
});

describe("runExtraction", () => {
  it("infers the config and writes one CSV row per record", async () => {
    const tools = new FakeDatasetTools(tminDataset(2, 2, 3));
    const destination = join(scratch, "out.csv");
    const result = await runExtraction({ source: dataset, destination, varname: "TMIN", tools, workspaceRoot });

    expect(result.rowCount).toBe(12);
    expect(result.destination).toBe(destination);
    expect(result.datasetFile).toBe(dataset);
    expect(result.config.varDisplayName).toBe("tmin");
    expect(result.tail).toHaveLength(10);
    expect(result.tail[9]).toBe("1,2,1,1010.2");

    const csv = (await readFile(destination, "utf8")).split("\n");
    expect(csv).toHaveLength(13);
    expect(csv.slice(0, 4)).toEqual(["0,0,0,0", "0,1,0,0.1", "0,2,0,0.2", "0,0,1,10"]);
    expect(csv[12]).toBe("");
  });

  it("uses a config file without probing metadata", async () => {
    const tools = new FakeDatasetTools(tminDataset(1, 1, 2));
    const destination = join(scratch, "out.csv");
    const result = await runExtraction({ source: dataset, destination, configFile: CONFIG_FILE, tools, workspaceRoot });
    expect(result.rowCount).toBe(2);
    expect(tools.calls.map((c) => c.op)).toEqual(["dumpRecords"]);
    await expect(readFile(destination, "utf8")).resolves.toBe("0,0,0,0\n0,1,0,0.1\n");
  });

  it("prefers the config file over a variable name", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const tools = new FakeDatasetTools(tminDataset(1, 1, 1));
    await runExtraction({
      source: dataset,
      destination: join(scratch, "out.csv"),
      configFile: CONFIG_FILE,
      varname: "tasmin",
      tools,
      workspaceRoot,
    });
    expect(warn).toHaveBeenCalledWith(`Using ${CONFIG_FILE}; --varname tasmin is ignored`);
  });

  it("requires a config file or a variable name", async () => {
    await expect(
      runExtraction({ source: dataset, destination: join(scratch, "out.csv"), workspaceRoot })
    ).rejects.toMatchObject({ name: "MalformedConfigError", stage: "pipeline", keys: ["cfg", "varname"] });
  });

  it("merges 2-D coordinates on rotated grids", async () => {
    const tools = new FakeDatasetTools(rotatedDataset());
    const destination = join(scratch, "rot.csv");
    const result = await runExtraction({
      source: dataset,
      destination,
      varname: "tasmin",
      rotated: true,
      tools,
      workspaceRoot,
      tailSize: 2,
    });
    expect(result.config.longitudeName).toBe("lon");
    expect(result.rowCount).toBe(12);
    expect(result.tail).toEqual(["1,-9.25,51.2,280", "1,-8.25,51.3,281"]);
    const csv = (await readFile(destination, "utf8")).split("\n");
    expect(csv[0]).toBe("0,-10.5,50.1,270");
    expect(csv[4]).toBe("0,-9.25,51.2,1e+20");
    expect(csv[6]).toBe("1,-10.5,50.1,276");
  });

  it("reads the first dataset of an archive and leaves no workspace behind", async () => {
    const src = join(scratch, "src");
    await mkdir(src);
    await writeFile(join(src, "grid.nc"), encodeNetcdf3(SMALL_GRID));
    await writeFile(join(src, "readme.txt"), "daily minimum temperature");
    const archive = join(scratch, "data.tar");
    await create({ file: archive, cwd: src }, ["grid.nc", "readme.txt"]);

    const destination = join(scratch, "out.csv");
    const result = await runExtraction({
      source: archive,
      archive: true,
      destination,
      varname: "tmin",
      tools: new NetcdfTools(),
      workspaceRoot,
    });

    expect(result.rowCount).toBe(12);
    expect(result.config.timeSize).toBe(2);
    await expect(readFile(destination, "utf8")).resolves.toBe(
      [
        "0,0,0,-1.5",
        "0,1,0,-2",
        "0,2,0,-9999",
        "0,0,1,0.25",
        "0,1,1,1",
        "0,2,1,2",
        "1,0,0,-3",
        "1,1,0,-4",
        "1,2,0,-5",
        "1,0,1,-6",
        "1,1,1,-7",
        "1,2,1,-8",
        "",
      ].join("\n")
    );
    await expect(readdir(workspaceRoot)).resolves.toEqual([]);
  });

  it("removes the workspace and partial output on failure", async () => {
    const tools = new FakeDatasetTools({
      ...tminDataset(),
      records: { tmin: () => ["time=0 lat=0 lon=0 tmin=1", "time=0 lat"] },
    });
    const destination = join(scratch, "out.csv");
    await expect(
      runExtraction({ source: dataset, destination, varname: "tmin", tools, workspaceRoot })
    ).rejects.toMatchObject({ name: "RecordFormatError", stage: "extract", lineNumber: 2 });
    await expect(readdir(workspaceRoot)).resolves.toEqual([]);
    expect((await readdir(scratch)).sort()).toEqual(["grid.nc", "work"]);
  });

  it("stops while streaming records and leaves nothing behind", async () => {
    const controller = new AbortController();
    const tools = new FakeDatasetTools({
      ...tminDataset(),
      records: {
        tmin: function* () {
          let n = 0;
          for (const line of gridLines(365, 100, 120)) {
            if (n === 5) controller.abort();
            n += 1;
            yield line;
          }
        },
      },
    });
    const destination = join(scratch, "out.csv");
    await expect(
      runExtraction({ source: dataset, destination, varname: "tmin", tools, workspaceRoot, signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    await expect(readdir(workspaceRoot)).resolves.toEqual([]);
    expect((await readdir(scratch)).sort()).toEqual(["grid.nc", "work"]);
  });

  it("stops before reading when already aborted", async () => {
    const tools = new FakeDatasetTools(tminDataset());
    const controller = new AbortController();
    controller.abort();
    await expect(
      runExtraction({
        source: dataset,
        destination: join(scratch, "out.csv"),
        varname: "tmin",
        tools,
        workspaceRoot,
        signal: controller.signal,
      })
    ).rejects.toThrow();
    expect(tools.calls).toEqual([]);
    await expect(readdir(workspaceRoot)).resolves.toEqual([]);
  });
});

describe("explainDataset", () => {
  it("returns the whole-file metadata dump", async () => {
    const tools = new FakeDatasetTools(tminDataset());
    await expect(explainDataset({ source: dataset, tools, workspaceRoot })).resolves.toBe(
      fixture("tmin-metadata.txt")
    );
    expect(tools.calls).toEqual([{ op: "probe", file: dataset, variable: undefined }]);
  });
});
