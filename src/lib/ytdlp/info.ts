import type { ResolvedMedia } from "../types.js";

type Json = Record<string, unknown>;

const isObject = (v: unknown): v is Json =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** yt-dlp arguments for a metadata-only, first-hit search */
export const buildSearchArgs = (query: string): string[] => [
  "-J",
  "--no-playlist",
  "--skip-download",
  "--quiet",
  "--no-warnings",
  `ytsearch1:${query}`,
];

/**
 * Pick the first hit out of `yt-dlp -J` output.
 * Search results come back as a playlist with `entries`; a direct url
 * returns the video itself.
 */
export function parseSearchResult(raw: string): ResolvedMedia | null {
  const json: unknown = JSON.parse(raw);
  if (!isObject(json)) return null;

  let item: unknown = json;
  if (Array.isArray(json.entries)) item = json.entries[0];
  if (!isObject(item)) return null;

  const locator = [item.webpage_url, item.original_url, item.url].find(
    (v): v is string => typeof v === "string" && v.length > 0
  );
  if (!locator) return null;

  const duration =
    typeof item.duration === "number" && Number.isFinite(item.duration)
      ? Math.max(0, Math.floor(item.duration))
      : 0;
  return { duration, locator };
}
