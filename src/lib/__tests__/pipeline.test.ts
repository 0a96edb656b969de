import { mkdir, readFile, readdir, writeFile } from "fs/promises";
import { join } from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { MalformedInputError } from "../errors.js";
import { runPipeline } from "../pipeline.js";
import { FakeSource, silentLog, tempDir } from "./fakes.js";

const CSV = [
  "title,artist,url",
  "Hello,Adele,https://open.spotify.com/track/a1",
  "Hello (Live),Adele,https://open.spotify.com/track/a1",
  "Rolling,Adele,https://open.spotify.com/track/r1",
  "Rolling,Adele,https://open.spotify.com/track/r2",
  "Skyfall,Adele,https://open.spotify.com/track/s1",
].join("\n");

describe("runPipeline", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await tempDir("pipeline-");
  });

  it("canonicalizes the chart and fetches only what is missing", async () => {
    await writeFile(join(dataDir, "charts.csv"), CSV);
    await mkdir(join(dataDir, "songs"));
    await writeFile(join(dataDir, "songs", "a1.mp3"), "audio");
    const source = new FakeSource();
    const config = loadConfig({
      DATA_DIR: dataDir,
      DRIFT_REPORT_PATH: join(dataDir, "url_drift.csv"),
    });

    const summary = await runPipeline(config, { source, log: silentLog() });

    expect(summary).toEqual({ succeeded: 2, failed: [] });
    expect(source.queries.sort()).toEqual(["Rolling Adele", "Skyfall Adele"]);
    expect((await readdir(join(dataDir, "songs"))).sort()).toEqual([
      "a1.mp3",
      "r1.mp3",
      "s1.mp3",
    ]);
    expect(await readFile(join(dataDir, "url_drift.csv"), "utf8")).toBe(
      "url,title,artist\n" +
        "https://open.spotify.com/track/a1,Hello,Adele\n" +
        "https://open.spotify.com/track/a1,Hello (Live),Adele\n"
    );
  });

  it("writes the failure manifest for items that could not be fetched", async () => {
    await writeFile(join(dataDir, "charts.csv"), CSV);
    const source = new FakeSource({ noMatch: (q) => q === "Skyfall Adele" });

    const summary = await runPipeline(loadConfig({ DATA_DIR: dataDir }), {
      source,
      log: silentLog(),
    });

    expect(summary).toEqual({
      succeeded: 2,
      failed: ["https://open.spotify.com/track/s1"],
    });
    expect(await readFile(join(dataDir, "failed_urls.txt"), "utf8")).toBe(
      "https://open.spotify.com/track/s1"
    );
  });

  it("stops before any download when the table is malformed", async () => {
    await writeFile(join(dataDir, "charts.csv"), "title,url\nHello,https://open.spotify.com/track/a1\n");
    const source = new FakeSource();

    await expect(
      runPipeline(loadConfig({ DATA_DIR: dataDir }), { source, log: silentLog() })
    ).rejects.toBeInstanceOf(MalformedInputError);
    expect(source.queries).toEqual([]);
    expect(await readdir(dataDir)).toEqual(["charts.csv"]);
  });
});
