import "dotenv/config";
import { join } from "path";
import { loadConfig } from "../lib/config.js";
import { findMetadataDrift } from "../lib/canonicalize.js";
import { writeDriftReport } from "../lib/core.js";
import { readRawTable } from "../lib/dataset.js";
import { errorMessage } from "../lib/errors.js";
import { makeDatasetSource } from "../lib/pipeline.js";

// Writes only the audit CSV of urls that appear under several titles/artists
const config = loadConfig();
const outPath =
  process.argv[2] ?? config.driftReportPath ?? join(config.dataDir, "url_drift.csv");

try {
  const csvPath = await makeDatasetSource(config).fetchDataset();
  const rows = findMetadataDrift(await readRawTable(csvPath));
  await writeDriftReport(rows, outPath);
  console.log(`Wrote ${rows.length} rows to ${outPath}`);
} catch (e) {
  console.error(errorMessage(e));
  process.exitCode = 1;
}
