import { spawn } from "child_process";
import type { ClipRequest, Log } from "../types.js";

/** Spawn a command; resolve with stdout on code 0, reject otherwise. */
export function run(
  cmd: string,
  args: string[],
  log: Log = console
): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const tail: string[] = [];
    const p = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    p.stdout.on("data", (d: Buffer) => chunks.push(d));
    p.stderr.on("data", (d: Buffer) => {
      const line = d.toString().trimEnd();
      tail.push(line);
      if (tail.length > 5) tail.shift();
      log.error(`[${cmd}] ${line}`);
    });
    p.on("error", reject);
    // "close" fires after stdout is drained; "exit" may come first
    p.on("close", (code) => {
      if (code === 0) return resolve(Buffer.concat(chunks).toString("utf8"));
      const detail = tail.length > 0 ? `: ${tail[tail.length - 1]}` : "";
      reject(new Error(`${cmd} exit ${code}${detail}`));
    });
  });
}

/** yt-dlp arguments for an audio-only download of one time range */
export function buildClipArgs(req: ClipRequest): string[] {
  const { start, end } = req.window;
  return [
    req.locator,
    "-f",
    "bestaudio/best",
    "-x",
    "--audio-format",
    req.codec,
    "--audio-quality",
    req.quality,
    "--download-sections",
    `*${start}-${end}`,
    "--no-playlist",
    "--quiet",
    "--no-warnings",
    "-o",
    `${req.outputPrefix}.%(ext)s`,
  ];
}
