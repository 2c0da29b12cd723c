import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join, normalize } from 'path';
import { isNotFound } from './fs-errors.js';

export interface StagedFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/**
 * Lists the regular files directly inside a staging directory, sorted by
 * file name. A missing directory yields an empty list; files that vanish
 * between listing and stat are skipped.
 */
export async function scanStagingDirectory(directoryPath: string): Promise<StagedFileInfo[]> {
  const normalizedPath = normalize(directoryPath);

  let entries: Dirent[];
  try {
    entries = await readdir(normalizedPath, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const files: StagedFileInfo[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const filePath = join(normalizedPath, entry.name);
    try {
      const fileStat = await stat(filePath);
      files.push({
        filePath,
        fileName: entry.name,
        sizeBytes: fileStat.size,
        modifiedAt: fileStat.mtime,
      });
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));
  return files;
}
