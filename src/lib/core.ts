import { mkdir, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import pLimit from "p-limit";
import { stringify } from "csv-stringify/sync";
import { fetchOne } from "./worker.js";
import { toInt } from "./utils.js";
import type { RawRecord, RunOptions, RunSummary, WorkItem } from "./types.js";

export const DEFAULT_CONCURRENCY = 12;
export const DEFAULT_PROGRESS_EVERY = 50;

/**
 * Overwrites the manifest with one url per line. An empty list removes
 * the file, so it only ever describes the latest run.
 */
export async function writeFailureManifest(
  manifestPath: string,
  urls: string[]
): Promise<void> {
  if (urls.length === 0) {
    await rm(manifestPath, { force: true });
    return;
  }
  await mkdir(dirname(manifestPath), { recursive: true });
  await writeFile(manifestPath, urls.join("\n"), "utf8");
}

/** Fetch every pending item through a bounded pool and report the result */
export async function runFetch(
  items: WorkItem[],
  opt: RunOptions
): Promise<RunSummary> {
  const log = opt.log ?? console;
  const limit = pLimit(toInt(opt.concurrency, DEFAULT_CONCURRENCY));
  const every = toInt(opt.progressEvery, DEFAULT_PROGRESS_EVERY);
  const total = items.length;

  let done = 0;
  let succeeded = 0;
  const failed: string[] = [];

  await Promise.all(
    items.map((item) =>
      limit(async () => {
        const outcome = await fetchOne(item, opt);
        done += 1;
        if (outcome.error !== null) {
          failed.push(item.url);
          log.error(`[fetch] [${done}/${total}] FAILED ${outcome.itemId}: ${outcome.error}`);
        } else {
          succeeded += 1;
          if (done % every === 0 || done === total) {
            log.log(`[fetch] [${done}/${total}] downloaded`);
          }
        }
      })
    )
  );

  if (failed.length > 0) {
    log.warn(`[fetch] ${failed.length} of ${total} items failed; see ${opt.manifestPath}`);
  } else {
    log.log(`[fetch] all ${total} items downloaded`);
  }
  await writeFailureManifest(opt.manifestPath, failed);

  return { succeeded, failed };
}

/** Drift audit as CSV, same column names as the source table */
export async function writeDriftReport(
  rows: RawRecord[],
  outPath: string
): Promise<string> {
  await mkdir(dirname(outPath), { recursive: true });
  const csv = stringify(
    rows.map((r) => [r.url, r.title, r.artist]),
    { header: true, columns: ["url", "title", "artist"] }
  );
  await writeFile(outPath, csv, "utf8");
  return outPath;
}
