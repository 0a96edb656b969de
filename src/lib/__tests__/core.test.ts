import { mkdir, readFile, readdir, writeFile } from "fs/promises";
import { join } from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { runFetch, writeDriftReport, writeFailureManifest } from "../core.js";
import { FakeSource, silentLog, tempDir } from "./fakes.js";
import type { MediaSource, RunOptions, WorkItem } from "../types.js";

const items = (n: number): WorkItem[] =>
  Array.from({ length: n }, (_, i) => ({
    url: `https://open.spotify.com/track/t${i}`,
    title: `Song ${i}`,
    artist: "Band",
    itemId: `t${i}`,
  }));

describe("runFetch", () => {
  let root: string;
  let manifestPath: string;
  let log: ReturnType<typeof silentLog>;

  const opts = (source: MediaSource, extra: Partial<RunOptions> = {}): RunOptions => ({
    storageRoot: root,
    source,
    clipSeconds: 30,
    codec: "mp3",
    quality: "192K",
    concurrency: 4,
    manifestPath,
    log,
    ...extra,
  });

  beforeEach(async () => {
    const dataDir = await tempDir();
    root = join(dataDir, "songs");
    await mkdir(root);
    manifestPath = join(dataDir, "failed_urls.txt");
    log = silentLog();
  });

  it("isolates failing items and records them in the manifest", async () => {
    const source = new FakeSource({
      noMatch: (q) => q === "Song 3 Band",
      failDownload: (req) => req.outputPrefix.endsWith("t7"),
    });

    const summary = await runFetch(items(10), opts(source));

    expect(summary.succeeded).toBe(8);
    expect([...summary.failed].sort()).toEqual([
      "https://open.spotify.com/track/t3",
      "https://open.spotify.com/track/t7",
    ]);
    const manifest = await readFile(manifestPath, "utf8");
    expect(manifest.split("\n")).toEqual(summary.failed);
    expect((await readdir(root)).sort()).toEqual(
      ["t0", "t1", "t2", "t4", "t5", "t6", "t8", "t9"].map((id) => `${id}.mp3`)
    );
    expect(log.error).toHaveBeenCalledTimes(2);
  });

  it("never exceeds the concurrency limit", async () => {
    const source = new FakeSource({ delayMs: 5, resolveDelayMs: () => 5 });
    const summary = await runFetch(items(20), opts(source, { concurrency: 3 }));

    expect(summary.succeeded).toBe(20);
    expect(source.maxActive).toBeGreaterThan(0);
    expect(source.maxActive).toBeLessThanOrEqual(3);
  });

  it("records failures in completion order, not submission order", async () => {
    const delays: Record<string, number> = {
      "Song 0 Band": 120,
      "Song 1 Band": 0,
      "Song 2 Band": 60,
    };
    const source = new FakeSource({
      resolveDelayMs: (q) => delays[q] ?? 0,
      noMatch: (q) => q !== "Song 1 Band",
      failDownload: () => true,
    });

    const summary = await runFetch(items(3), opts(source, { concurrency: 3 }));

    const expected = ["t1", "t2", "t0"].map((id) => `https://open.spotify.com/track/${id}`);
    expect(summary).toEqual({ succeeded: 0, failed: expected });
    expect(await readFile(manifestPath, "utf8")).toBe(expected.join("\n"));
  });

  it("dispatches every item exactly once", async () => {
    const source = new FakeSource();
    await runFetch(items(25), opts(source, { concurrency: 12 }));
    expect(source.queries.sort()).toEqual(
      items(25)
        .map((i) => `${i.title} Band`)
        .sort()
    );
  });

  it("logs progress at the configured cadence and on the last item", async () => {
    const source = new FakeSource();
    await runFetch(items(3), opts(source, { concurrency: 1, progressEvery: 2 }));

    expect(log.log.mock.calls).toEqual([
      ["[fetch] [2/3] downloaded"],
      ["[fetch] [3/3] downloaded"],
      ["[fetch] all 3 items downloaded"],
    ]);
  });

  it("writes no manifest and clears a stale one when nothing fails", async () => {
    await writeFile(manifestPath, "https://open.spotify.com/track/old");

    const summary = await runFetch(items(2), opts(new FakeSource()));

    expect(summary).toEqual({ succeeded: 2, failed: [] });
    await expect(readFile(manifestPath, "utf8")).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("handles an empty work set", async () => {
    const summary = await runFetch([], opts(new FakeSource()));
    expect(summary).toEqual({ succeeded: 0, failed: [] });
  });
});

describe("writeFailureManifest", () => {
  it("overwrites the previous run", async () => {
    const path = join(await tempDir(), "failed_urls.txt");
    await writeFailureManifest(path, ["a", "b", "c"]);
    await writeFailureManifest(path, ["d"]);
    expect(await readFile(path, "utf8")).toBe("d");
  });
});

describe("writeDriftReport", () => {
  it("writes a CSV with a header row", async () => {
    const path = join(await tempDir(), "reports", "drift.csv");
    await writeDriftReport(
      [
        { url: "u1", title: "Hello, World", artist: "A" },
        { url: "u1", title: "Hello World", artist: "A" },
      ],
      path
    );
    expect(await readFile(path, "utf8")).toBe(
      'url,title,artist\nu1,"Hello, World",A\nu1,Hello World,A\n'
    );
  });
});
