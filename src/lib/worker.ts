import { readdir, rm } from "fs/promises";
import { join } from "path";
import { DownloadError, ResolutionError, errorMessage } from "./errors.js";
import { buildQuery, clipWindow, isSafeItemId } from "./utils.js";
import type { FetchOptions, FetchOutcome, ResolvedMedia, WorkItem } from "./types.js";

/** Remove anything yt-dlp may have left for this item (.part, .webm, .mp3, ...) */
export async function removeItemFiles(storageRoot: string, itemId: string) {
  const prefix = `${itemId}.`;
  const names = await readdir(storageRoot);
  await Promise.all(
    names
      .filter((n) => n.startsWith(prefix))
      .map((n) => rm(join(storageRoot, n), { force: true }))
  );
}

async function resolveItem(
  item: WorkItem,
  opt: FetchOptions
): Promise<ResolvedMedia> {
  const query = buildQuery(item);
  let media: ResolvedMedia | null;
  try {
    media = await opt.source.resolve(query);
  } catch (e) {
    throw new ResolutionError(`search failed for "${query}": ${errorMessage(e)}`, {
      cause: e,
    });
  }
  if (!media) throw new ResolutionError(`no match for "${query}"`);
  return media;
}

/**
 * Fetch one clip into `{storageRoot}/{itemId}.{codec}`.
 * Never throws: failures come back on the outcome, and any partial files
 * for the item are removed first.
 */
export async function fetchOne(
  item: WorkItem,
  opt: FetchOptions
): Promise<FetchOutcome> {
  // nothing is written or cleaned up for an id that is not a plain file name
  if (!isSafeItemId(item.itemId)) {
    return {
      itemId: item.itemId,
      error: `unusable item id ${JSON.stringify(item.itemId)} for ${item.url}`,
    };
  }
  try {
    const media = await resolveItem(item, opt);
    const window = clipWindow(media.duration, opt.clipSeconds);
    try {
      await opt.source.download({
        locator: media.locator,
        window,
        outputPrefix: join(opt.storageRoot, item.itemId),
        codec: opt.codec,
        quality: opt.quality,
      });
    } catch (e) {
      throw new DownloadError(errorMessage(e), { cause: e });
    }
    return { itemId: item.itemId, error: null };
  } catch (e) {
    let error = errorMessage(e);
    try {
      await removeItemFiles(opt.storageRoot, item.itemId);
    } catch (cleanupErr) {
      error += ` (cleanup failed: ${errorMessage(cleanupErr)})`;
    }
    return { itemId: item.itemId, error };
  }
}
