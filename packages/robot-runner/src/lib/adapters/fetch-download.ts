import { createWriteStream } from "fs";
import { Writable } from "stream";
import type { DownloadService } from "../ports/download.js";

/**
 * Create a download service using fetch.
 * Streams the response body to disk without buffering it in memory.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch
): DownloadService {
  return {
    async download(url: string, outputPath: string): Promise<void> {
      const response = await fetchImpl(url, { redirect: "follow" });

      if (!response.ok) {
        throw new Error(
          `Failed to download ${url}: ${response.status} ${response.statusText}`
        );
      }

      const body = response.body;
      if (!body) {
        throw new Error(`No response body from ${url}`);
      }

      const fileStream = createWriteStream(outputPath);
      const writable = Writable.toWeb(fileStream) as WritableStream<Uint8Array>;
      await body.pipeTo(writable);
    },
  };
}
