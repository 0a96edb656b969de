import { createReadStream } from "fs";
import { access, mkdir, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { CsvError, parse } from "csv-parse";
import { DatasetError, MalformedInputError, errorMessage } from "./errors.js";
import { REQUIRED_COLUMNS } from "./canonicalize.js";
import type { RawRow, RawTable } from "./types.js";

export interface DatasetSource {
  /** Local path of the CSV; safe to call repeatedly */
  fetchDataset(): Promise<string>;
}

const exists = async (p: string) => {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
};

/** A CSV that is already on disk */
export class LocalDatasetSource implements DatasetSource {
  constructor(private readonly path: string) {}

  async fetchDataset(): Promise<string> {
    if (!(await exists(this.path))) {
      throw new DatasetError(`Dataset not found at ${this.path}`);
    }
    return this.path;
  }
}

/** Downloads the CSV once and serves the cached copy afterwards */
export class HttpDatasetSource implements DatasetSource {
  constructor(
    private readonly url: string,
    private readonly cachePath: string,
    private readonly log: Pick<Console, "log"> = console
  ) {}

  async fetchDataset(): Promise<string> {
    if (await exists(this.cachePath)) return this.cachePath;

    this.log.log(`[dataset] downloading ${this.url}`);
    await mkdir(dirname(this.cachePath), { recursive: true });
    const tmp = `${this.cachePath}.part`;
    try {
      const res = await fetch(this.url);
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      await writeFile(tmp, Buffer.from(await res.arrayBuffer()));
      await rename(tmp, this.cachePath);
    } catch (e) {
      await rm(tmp, { force: true });
      throw new DatasetError(
        `Failed to download ${this.url}: ${errorMessage(e)}`,
        { cause: e }
      );
    }
    return this.cachePath;
  }
}

const cell = (record: Record<string, unknown>, key: string) => {
  const v = record[key];
  return typeof v === "string" ? v : undefined;
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function assertColumns(columns: string[], path: string) {
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new MalformedInputError(
      `${path}: missing required column(s): ${missing.join(", ")}`
    );
  }
}

/**
 * Stream a chart CSV, keeping url/title/artist only.
 * Exact duplicate rows are dropped (first kept), which leaves every
 * first-seen choice of the canonicalizer unchanged.
 */
export async function readRawTable(path: string): Promise<RawTable> {
  const state: { columns: string[] | null } = { columns: null };
  const rows: RawRow[] = [];
  const seen = new Set<string>();

  const parser = parse({
    columns: (header: unknown[]) => {
      const names = header.map((h) => String(h).trim());
      state.columns = names;
      return names;
    },
    skip_empty_lines: true,
    bom: true,
  });
  // pipe() does not forward read errors (e.g. ENOENT) to the parser
  const input = createReadStream(path);
  input.on("error", (e) => parser.destroy(e));
  input.pipe(parser);

  try {
    let checked = false;
    for await (const record of parser) {
      if (!checked) {
        assertColumns(state.columns ?? [], path);
        checked = true;
      }
      if (!isRecord(record)) continue;
      const row: RawRow = {
        url: cell(record, "url"),
        title: cell(record, "title"),
        artist: cell(record, "artist"),
      };
      const key = JSON.stringify([row.url, row.title, row.artist]);
      if (seen.has(key)) continue;
      seen.add(key);
      rows.push(row);
    }
  } catch (e) {
    if (e instanceof MalformedInputError) throw e;
    if (e instanceof CsvError) {
      throw new MalformedInputError(`${path}: ${e.message}`, { cause: e });
    }
    throw new DatasetError(`Cannot read ${path}: ${errorMessage(e)}`, {
      cause: e,
    });
  }

  const header = state.columns ?? [];
  assertColumns(header, path);
  return { columns: header, rows };
}
