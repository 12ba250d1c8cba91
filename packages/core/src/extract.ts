import { createWriteStream, type Dirent } from "node:fs";
import { mkdir, readdir, stat } from "node:fs/promises";
import { dirname, join, normalize, resolve, sep } from "node:path";
import { pipeline } from "node:stream/promises";
import { extract as tarExtract } from "tar";
import unzipper from "unzipper";
import {
  BinaryNotFoundError,
  ExtractionFailedError,
  formatError,
} from "./errors.js";
import type { ArchiveType } from "./types.js";

const MAX_SEARCH_DEPTH = 3;

const validatePath = (entryPath: string, targetDir: string): string => {
  const resolvedEntry = normalize(resolve(targetDir, entryPath));
  const resolvedTarget = normalize(resolve(targetDir));

  if (
    resolvedEntry !== resolvedTarget &&
    !resolvedEntry.startsWith(resolvedTarget + sep)
  ) {
    throw new Error(
      `path traversal detected: ${entryPath} resolves outside target directory`
    );
  }
  return resolvedEntry;
};

export const getArchiveType = (filename: string): ArchiveType | undefined => {
  if (filename.endsWith(".tar.gz") || filename.endsWith(".tgz")) {
    return "tar.gz";
  }
  if (filename.endsWith(".zip")) {
    return "zip";
  }
  return undefined;
};

const extractTarGz = async (
  archivePath: string,
  destination: string
): Promise<void> => {
  await tarExtract({
    file: archivePath,
    cwd: destination,
    strict: true,
    filter: (path: string) => {
      validatePath(path, destination);
      return true;
    },
  });
};

const extractZip = async (
  archivePath: string,
  destination: string
): Promise<void> => {
  const directory = await unzipper.Open.file(archivePath);

  for (const file of directory.files) {
    const target = validatePath(file.path, destination);

    if (file.type === "Directory") {
      await mkdir(target, { recursive: true });
      continue;
    }

    await mkdir(dirname(target), { recursive: true });
    await pipeline(file.stream(), createWriteStream(target));
  }
};

/**
 * Unpacks a `.tar.gz` or `.zip` archive into `destination`.
 * Entries escaping the destination abort the extraction.
 */
export const extractArchive = async (
  archivePath: string,
  destination: string
): Promise<void> => {
  const archiveType = getArchiveType(archivePath);
  if (!archiveType) {
    throw new ExtractionFailedError(
      archivePath,
      "unknown archive type (supported: .tar.gz, .tgz, .zip)"
    );
  }

  await mkdir(destination, { recursive: true });

  try {
    if (archiveType === "zip") {
      await extractZip(archivePath, destination);
    } else {
      await extractTarGz(archivePath, destination);
    }
  } catch (error) {
    throw new ExtractionFailedError(archivePath, formatError(error));
  }
};

const isFile = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

const searchBinary = async (
  dir: string,
  binaryName: string,
  depth: number
): Promise<string | undefined> => {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return undefined;
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name === binaryName) {
      return join(dir, entry.name);
    }
  }

  if (depth >= MAX_SEARCH_DEPTH) {
    return undefined;
  }

  for (const entry of entries) {
    if (entry.isDirectory()) {
      const found = await searchBinary(
        join(dir, entry.name),
        binaryName,
        depth + 1
      );
      if (found) {
        return found;
      }
    }
  }
  return undefined;
};

/**
 * Finds the executable inside an extracted archive: the archive root first,
 * then a search bounded to three directory levels.
 */
export const locateBinary = async (
  dir: string,
  binaryName: string
): Promise<string> => {
  const direct = join(dir, binaryName);
  if (await isFile(direct)) {
    return direct;
  }

  const found = await searchBinary(dir, binaryName, 1);
  if (!found) {
    throw new BinaryNotFoundError(binaryName, dir);
  }
  return found;
};
