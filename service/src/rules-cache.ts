/**
 * Rules Cache
 *
 * Holds the extracted text of the rules document for the life of the process.
 * The first caller triggers the download; concurrent callers share that one load.
 * A failed load is not remembered, so the next request tries again.
 */

import { rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { randomUUID } from "crypto";
import type { ObjectStore } from "./storage.js";
import type { TextExtractor } from "./pdf-extract.js";
import { StorageError, getErrorMessage } from "./errors.js";

export interface RulesLocation {
  bucket: string;
  key: string;
}

export class RulesCache {
  private value: string | null = null;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly store: ObjectStore,
    private readonly extractor: TextExtractor,
    private readonly location: RulesLocation,
  ) {}

  isLoaded(): boolean {
    return this.value !== null;
  }

  async get(): Promise<string> {
    if (this.value !== null) return this.value;

    if (!this.pending) {
      this.pending = this.load()
        .then((text) => {
          this.value = text;
          return text;
        })
        .finally(() => {
          this.pending = null;
        });
    }

    return this.pending;
  }

  private async load(): Promise<string> {
    const { bucket, key } = this.location;
    const tempPath = join(tmpdir(), `rules-${randomUUID()}.pdf`);

    console.log(`[RulesCache] Loading rules from ${bucket}/${key}`);

    try {
      await this.store.downloadToFile(bucket, key, tempPath);
      const { text, pageCount } = await this.extractor.extract(tempPath);
      console.log(
        `[RulesCache] Loaded rules: ${pageCount} page(s), ${text.length} chars`,
      );
      return text;
    } catch (error) {
      throw new StorageError(
        `Failed to download or parse rules: ${getErrorMessage(error)}`,
        { cause: error },
      );
    } finally {
      await rm(tempPath, { force: true });
    }
  }
}
