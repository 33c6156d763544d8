/**
 * Fetches a release artifact to a local file.
 * Must reject on any transport or HTTP failure; callers remove the partial file.
 */
export interface DownloadService {
  download(url: string, outputPath: string): Promise<void>;
}
