import type { Config } from "./config.js";
import { canonicalize, findMetadataDrift } from "./canonicalize.js";
import { DirectoryLedger, ensureStorageRoot, pending } from "./completion.js";
import type { CompletionLedger } from "./completion.js";
import { runFetch, writeDriftReport } from "./core.js";
import { HttpDatasetSource, LocalDatasetSource, readRawTable } from "./dataset.js";
import type { DatasetSource } from "./dataset.js";
import { toWorkItems } from "./utils.js";
import { YtDlpSource } from "./ytdlp/index.js";
import type { Log, MediaSource, RunSummary } from "./types.js";

export type PipelineDeps = {
  dataset?: DatasetSource;
  source?: MediaSource;
  ledger?: CompletionLedger;
  log?: Log;
};

export function makeDatasetSource(config: Config, log: Log = console): DatasetSource {
  return config.datasetUrl
    ? new HttpDatasetSource(config.datasetUrl, config.datasetPath, log)
    : new LocalDatasetSource(config.datasetPath);
}

/**
 * dataset -> canonical table -> pending items -> clips.
 * Anything thrown here (bad CSV, unusable storage) happens before the
 * first download is dispatched.
 */
export async function runPipeline(
  config: Config,
  deps: PipelineDeps = {}
): Promise<RunSummary> {
  const log = deps.log ?? console;
  const dataset = deps.dataset ?? makeDatasetSource(config, log);
  const source = deps.source ?? new YtDlpSource(config.ytdlpBin, log);

  const csvPath = await dataset.fetchDataset();
  const table = await readRawTable(csvPath);
  const canonical = canonicalize(table);
  log.log(
    `[pipeline] ${table.rows.length} distinct raw rows -> ${canonical.length} canonical songs`
  );

  if (config.driftReportPath) {
    const drift = findMetadataDrift(table);
    await writeDriftReport(drift, config.driftReportPath);
    log.log(`[pipeline] wrote ${drift.length} drift rows to ${config.driftReportPath}`);
  }

  await ensureStorageRoot(config.songsDir);
  const ledger = deps.ledger ?? new DirectoryLedger(config.songsDir, config.audioFormat);
  const items = toWorkItems(canonical);
  const todo = await pending(items, ledger);
  log.log(
    `[pipeline] downloading ${todo.length} songs (${items.length - todo.length} already downloaded)`
  );

  return runFetch(todo, {
    storageRoot: config.songsDir,
    source,
    clipSeconds: config.clipSeconds,
    codec: config.audioFormat,
    quality: config.audioQuality,
    concurrency: config.concurrency,
    manifestPath: config.failedUrlsPath,
    progressEvery: config.progressEvery,
    log,
  });
}
