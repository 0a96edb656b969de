import { mkdir, readdir } from "fs/promises";
import { StorageError, errorMessage } from "./errors.js";
import type { WorkItem } from "./types.js";

/** Where "is this item already done?" is answered */
export interface CompletionLedger {
  completedIds(): Promise<Set<string>>;
}

/** Treats every `{id}.{extension}` file in the storage root as a finished item */
export class DirectoryLedger implements CompletionLedger {
  constructor(
    private readonly storageRoot: string,
    private readonly extension: string
  ) {}

  async completedIds(): Promise<Set<string>> {
    const suffix = `.${this.extension}`;
    let names: string[];
    try {
      names = await readdir(this.storageRoot);
    } catch (e) {
      throw new StorageError(
        `Cannot list ${this.storageRoot}: ${errorMessage(e)}`,
        { cause: e }
      );
    }
    return new Set(
      names
        .filter((n) => n.endsWith(suffix) && n.length > suffix.length)
        .map((n) => n.slice(0, -suffix.length))
    );
  }
}

export async function ensureStorageRoot(storageRoot: string): Promise<void> {
  try {
    await mkdir(storageRoot, { recursive: true });
  } catch (e) {
    throw new StorageError(
      `Cannot create ${storageRoot}: ${errorMessage(e)}`,
      { cause: e }
    );
  }
}

/** Items not yet completed, in canonical order */
export async function pending(
  items: WorkItem[],
  ledger: CompletionLedger
): Promise<WorkItem[]> {
  const done = await ledger.completedIds();
  return items.filter((item) => !done.has(item.itemId));
}
