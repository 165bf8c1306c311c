/**
 * Supabase Storage access for the rules document.
 * Objects are downloaded to a caller-chosen local path; the caller owns its cleanup.
 */

import { writeFile } from "fs/promises";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { StorageError, getErrorMessage } from "./errors.js";

export interface ObjectStore {
  /** Downloads `bucket/key` to `destPath`. Throws StorageError if absent or inaccessible. */
  downloadToFile(bucket: string, key: string, destPath: string): Promise<void>;
}

/**
 * Supabase client with the service role key (full access to storage).
 */
export function createStorageClient(
  env: NodeJS.ProcessEnv = process.env,
): SupabaseClient {
  const url = env.SUPABASE_URL;
  const secretKey = env.SB_SECRET_KEY;
  if (!url || !secretKey) {
    throw new Error("SUPABASE_URL and SB_SECRET_KEY are required");
  }
  return createClient(url, secretKey, {
    auth: { persistSession: false },
  });
}

export class SupabaseObjectStore implements ObjectStore {
  constructor(private readonly client: SupabaseClient) {}

  async downloadToFile(
    bucket: string,
    key: string,
    destPath: string,
  ): Promise<void> {
    const { data, error } = await this.client.storage.from(bucket).download(key);

    if (error || !data) {
      throw new StorageError(
        `Failed to download ${bucket}/${key}: ${error ? error.message : "empty response"}`,
        { cause: error },
      );
    }

    try {
      await writeFile(destPath, Buffer.from(await data.arrayBuffer()));
    } catch (writeError) {
      throw new StorageError(
        `Failed to write ${bucket}/${key} to ${destPath}: ${getErrorMessage(writeError)}`,
        { cause: writeError },
      );
    }

    console.log(`[Storage] Downloaded ${bucket}/${key} (${data.size} bytes)`);
  }
}
