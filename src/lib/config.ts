import { join } from "path";
import { toInt } from "./utils.js";

export type Config = {
  dataDir: string;
  songsDir: string;
  datasetPath: string;
  datasetUrl?: string;
  failedUrlsPath: string;
  driftReportPath?: string;
  concurrency: number;
  clipSeconds: number;
  audioFormat: string;
  audioQuality: string;
  progressEvery: number;
  ytdlpBin: string;
};

type Env = Record<string, string | undefined>;

const str = (v: string | undefined) => (v && v.trim() ? v.trim() : undefined);

// Defaults mirror the layout the pipeline has always used: data/, data/songs/
export function loadConfig(env: Env = process.env): Config {
  const dataDir = str(env.DATA_DIR) ?? join(process.cwd(), "data");
  return {
    dataDir,
    songsDir: str(env.SONGS_DIR) ?? join(dataDir, "songs"),
    datasetPath: str(env.DATASET_PATH) ?? join(dataDir, "charts.csv"),
    datasetUrl: str(env.DATASET_URL),
    failedUrlsPath: str(env.FAILED_URLS_PATH) ?? join(dataDir, "failed_urls.txt"),
    driftReportPath: str(env.DRIFT_REPORT_PATH),
    concurrency: toInt(env.CONCURRENCY, 12),
    clipSeconds: toInt(env.CLIP_SECONDS, 30),
    audioFormat: str(env.AUDIO_FORMAT) ?? "mp3",
    audioQuality: str(env.AUDIO_QUALITY) ?? "192K",
    progressEvery: toInt(env.PROGRESS_EVERY, 50),
    ytdlpBin: str(env.YTDLP_BIN) ?? "yt-dlp",
  };
}
