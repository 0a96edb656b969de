import type { CanonicalRecord, ClipWindow, WorkItem } from "./types.js";

// Text after the last "/" of a track url, e.g. ".../track/3n3Ppam7vgaVa1iaRUc9Lp"
export const itemIdFromUrl = (url: string): string =>
  url.slice(url.lastIndexOf("/") + 1);

// Ids become file names directly under the storage root
export const isSafeItemId = (id: string): boolean =>
  id !== "" && id !== "." && id !== ".." && !/[\/\\]/.test(id);

export const toWorkItems = (records: CanonicalRecord[]): WorkItem[] =>
  records.map((r) => ({ ...r, itemId: itemIdFromUrl(r.url) }));

// Search query handed to the resolver
export const buildQuery = (item: Pick<CanonicalRecord, "title" | "artist">) =>
  `${item.title} ${item.artist}`;

/**
 * Middle slice of a track. Short tracks are taken whole; an unknown
 * duration (0) asks for the first clipSeconds and lets the source truncate.
 */
export function clipWindow(duration: number, clipSeconds: number): ClipWindow {
  if (!(duration > 0)) return { start: 0, end: clipSeconds };
  if (duration <= clipSeconds) return { start: 0, end: duration };
  const start = Math.floor((duration - clipSeconds) / 2);
  return { start, end: start + clipSeconds };
}

// Whole numbers from env/options; anything else falls back to the default
export const toInt = (
  value: string | number | undefined,
  fallback: number,
  min = 1
): number => {
  const n = typeof value === "number" ? value : parseInt(value ?? "", 10);
  return Number.isFinite(n) ? Math.max(min, Math.floor(n)) : fallback;
};
