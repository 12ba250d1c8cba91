import { createHash } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { once } from "node:events";
import { DownloadFailedError, formatError } from "./errors.js";

const USER_AGENT = "meldoc-installer";

export interface DownloadOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (downloaded: number, total: number) => void;
}

export interface DownloadResult {
  readonly path: string;
  readonly size: number;
  readonly sha256: string;
}

const request = async (
  url: string,
  signal: AbortSignal | undefined
): Promise<Response> => {
  try {
    return await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    throw new DownloadFailedError(url, formatError(error));
  }
};

/**
 * Streams `url` into `destination`, hashing on the way.
 * Any non-2xx status, transport error or empty body is a DownloadFailedError;
 * the partial file is removed.
 */
export const downloadFile = async (
  url: string,
  destination: string,
  options: DownloadOptions = {}
): Promise<DownloadResult> => {
  const { signal, onProgress } = options;

  await mkdir(dirname(destination), { recursive: true });

  const response = await request(url, signal);

  if (!response.ok) {
    throw new DownloadFailedError(url, `HTTP ${response.status}`);
  }
  if (!response.body) {
    throw new DownloadFailedError(url, "no response body");
  }

  const total = Number(response.headers.get("content-length")) || 0;
  const hash = createHash("sha256");
  const fileStream = createWriteStream(destination);
  const reader = response.body.getReader();
  let downloaded = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      hash.update(value);
      downloaded += value.length;
      onProgress?.(downloaded, total);

      if (!fileStream.write(value)) {
        await once(fileStream, "drain");
      }
    }

    fileStream.end();
    await once(fileStream, "finish");
  } catch (error) {
    fileStream.destroy();
    await unlink(destination).catch(() => undefined);
    if (signal?.aborted) {
      throw error;
    }
    throw new DownloadFailedError(url, formatError(error));
  }

  if (downloaded === 0) {
    await unlink(destination).catch(() => undefined);
    throw new DownloadFailedError(url, "downloaded file is empty");
  }

  return {
    path: destination,
    size: downloaded,
    sha256: hash.digest("hex"),
  };
};

/**
 * Fetches a small text document; resolves to null on any failure.
 * Used for optional resources such as the checksum manifest.
 */
export const fetchOptionalText = async (
  url: string,
  signal?: AbortSignal
): Promise<string | null> => {
  try {
    const response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal,
    });
    if (!response.ok) {
      return null;
    }
    return await response.text();
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    return null;
  }
};

export const formatBytes = (bytes: number): string => {
  if (bytes === 0) {
    return "0 B";
  }
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${Number.parseFloat((bytes / k ** i).toFixed(1))} ${sizes[i]}`;
};
