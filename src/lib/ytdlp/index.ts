import { stat } from "fs/promises";
import type { ClipRequest, Log, MediaSource, ResolvedMedia } from "../types.js";
import { buildSearchArgs, parseSearchResult } from "./info.js";
import { buildClipArgs, run } from "./process.js";

export { buildClipArgs, run } from "./process.js";
export { buildSearchArgs, parseSearchResult } from "./info.js";

/** MediaSource backed by the yt-dlp binary (ffmpeg must be on PATH too) */
export class YtDlpSource implements MediaSource {
  constructor(
    private readonly bin = "yt-dlp",
    private readonly log: Log = console
  ) {}

  async resolve(query: string): Promise<ResolvedMedia | null> {
    const out = await run(this.bin, buildSearchArgs(query), this.log);
    return parseSearchResult(out);
  }

  async download(req: ClipRequest): Promise<string> {
    await run(this.bin, buildClipArgs(req), this.log);
    // -x rewrites the extension to the target codec
    const path = `${req.outputPrefix}.${req.codec}`;
    const st = await stat(path);
    if (!st.isFile() || st.size === 0) {
      throw new Error(`yt-dlp produced no audio at ${path}`);
    }
    return path;
  }
}
