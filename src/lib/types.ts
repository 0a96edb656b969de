export type RawRecord = {
  url: string;
  title: string;
  artist: string;
};

// Rows straight off the tabular source; values are checked by canonicalize
export type RawRow = Record<string, string | null | undefined>;

export type RawTable = {
  columns: string[];
  rows: RawRow[];
};

export type CanonicalRecord = RawRecord;

export type WorkItem = CanonicalRecord & {
  itemId: string; // last path segment of url, used as the file name
};

export type FetchOutcome = {
  readonly itemId: string;
  readonly error: string | null;
};

export type RunSummary = {
  succeeded: number;
  failed: string[]; // urls, completion order
};

export type ClipWindow = {
  start: number; // seconds
  end: number;
};

export type ResolvedMedia = {
  duration: number; // seconds, 0 when unknown
  locator: string;
};

export type ClipRequest = {
  locator: string;
  window: ClipWindow;
  outputPrefix: string; // destination path without extension
  codec: string;
  quality: string;
};

/** Search-and-transcode collaborator (yt-dlp in production) */
export interface MediaSource {
  resolve(query: string): Promise<ResolvedMedia | null>;
  download(req: ClipRequest): Promise<string>;
}

export type Log = Pick<Console, "log" | "warn" | "error">;

export type FetchOptions = {
  storageRoot: string;
  source: MediaSource;
  clipSeconds: number; // e.g. 30
  codec: string; // e.g. "mp3"
  quality: string; // e.g. "192K"
  log?: Log;
};

export type RunOptions = FetchOptions & {
  concurrency: number; // default 12
  manifestPath: string;
  progressEvery?: number; // default 50
};
