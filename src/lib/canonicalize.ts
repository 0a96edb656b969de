import { MalformedInputError } from "./errors.js";
import type { CanonicalRecord, RawRecord, RawTable } from "./types.js";

export const REQUIRED_COLUMNS = ["url", "title", "artist"] as const;

// JSON keeps the pair unambiguous when a title or artist contains the separator
const pairKey = (r: RawRecord) => JSON.stringify([r.title, r.artist]);
const tripleKey = (r: RawRecord) => JSON.stringify([r.url, r.title, r.artist]);

/** Checks the header and every row, returning plain records in source order */
export function validateTable(table: RawTable): RawRecord[] {
  const missing = REQUIRED_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new MalformedInputError(
      `Missing required column(s): ${missing.join(", ")}`
    );
  }

  return table.rows.map((row, idx) => {
    const { url, title, artist } = row;
    if (
      typeof url !== "string" ||
      typeof title !== "string" ||
      typeof artist !== "string"
    ) {
      throw new MalformedInputError(
        `Row ${idx + 1} has a missing or non-string url, title or artist`
      );
    }
    return { url, title, artist };
  });
}

/**
 * Pass 1: one (title, artist) per url.
 * The first row seen for a url supplies the spelling for all of its rows.
 */
export function resolveMetadataDrift(rows: RawRecord[]): RawRecord[] {
  const byUrl = new Map<string, { title: string; artist: string }>();
  for (const r of rows) {
    if (!byUrl.has(r.url)) byUrl.set(r.url, { title: r.title, artist: r.artist });
  }
  return rows.map((r) => {
    const canonical = byUrl.get(r.url) ?? r;
    return { url: r.url, title: canonical.title, artist: canonical.artist };
  });
}

/**
 * Pass 2: one url per (title, artist).
 * Must run on the output of pass 1, since the grouping key is the
 * normalized pair.
 */
export function resolveReleaseDuplicates(rows: RawRecord[]): RawRecord[] {
  const byPair = new Map<string, string>();
  for (const r of rows) {
    const key = pairKey(r);
    if (!byPair.has(key)) byPair.set(key, r.url);
  }
  return rows.map((r) => ({
    url: byPair.get(pairKey(r)) ?? r.url,
    title: r.title,
    artist: r.artist,
  }));
}

/** Distinct triples, first appearance wins */
export function distinctRecords(rows: RawRecord[]): RawRecord[] {
  const seen = new Set<string>();
  const out: RawRecord[] = [];
  for (const r of rows) {
    const key = tripleKey(r);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}

/**
 * Collapse a raw chart table into a 1:1 url <-> (title, artist) mapping.
 *
 * "First" is always first in source row order, so the result is
 * reproducible for a given input file.
 */
export function canonicalize(table: RawTable): CanonicalRecord[] {
  const rows = validateTable(table);
  const step1 = resolveMetadataDrift(rows);
  const step2 = resolveReleaseDuplicates(step1);
  return distinctRecords(step2);
}

const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Audit rows: every distinct raw triple of a url that carries more than one
 * (title, artist) spelling, sorted by url, title, artist.
 */
export function findMetadataDrift(table: RawTable): RawRecord[] {
  const rows = distinctRecords(validateTable(table));

  const pairsPerUrl = new Map<string, number>();
  for (const r of rows) {
    pairsPerUrl.set(r.url, (pairsPerUrl.get(r.url) ?? 0) + 1);
  }

  return rows
    .filter((r) => (pairsPerUrl.get(r.url) ?? 0) > 1)
    .sort(
      (a, b) =>
        compare(a.url, b.url) ||
        compare(a.title, b.title) ||
        compare(a.artist, b.artist)
    );
}
