/**
 * Toolchain bundle downloads.
 */

import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

export interface Downloader {
  /** Fetch `url` into the file at `destination`, replacing it. */
  download(url: string, destination: string): Promise<void>;
}

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/** Streams the response body straight to disk; bundles can be hundreds of MB. */
export class FetchDownloader implements Downloader {
  async download(url: string, destination: string): Promise<void> {
    let res: Response;
    try {
      res = await fetch(url, { redirect: 'follow' });
    } catch (err) {
      throw new DownloadError(`connection failed: ${err instanceof Error ? err.message : 'unknown error'}`);
    }

    if (!res.ok) {
      throw new DownloadError(`HTTP ${res.status}`, res.status);
    }
    if (!res.body) {
      throw new DownloadError(`HTTP ${res.status} with empty body`, res.status);
    }

    await pipeline(Readable.fromWeb(res.body), createWriteStream(destination));
  }
}
