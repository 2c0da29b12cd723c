import { chmod } from 'fs/promises';

/**
 * "Make this path unreadable to anyone but its owner, or without an
 * OS-level unlock." The gateway calls it for the staging directory and for
 * each staged copy; what that means is left to the implementation.
 */
export interface StorageProtection {
  readonly name: string;
  protectDirectory(dirPath: string): Promise<void>;
  protectFile(filePath: string): Promise<void>;
}

/** For platforms with no protection toggle at all. */
export const noStorageProtection: StorageProtection = {
  name: 'none',
  protectDirectory: () => Promise.resolve(),
  protectFile: () => Promise.resolve(),
};

/** POSIX permission bits: 0700 directories, 0600 files. */
export const ownerOnlyStorageProtection: StorageProtection = {
  name: 'owner-only',
  async protectDirectory(dirPath) {
    await chmod(dirPath, 0o700);
  },
  async protectFile(filePath) {
    await chmod(filePath, 0o600);
  },
};

export function defaultStorageProtection(platform: NodeJS.Platform = process.platform): StorageProtection {
  return platform === 'win32' ? noStorageProtection : ownerOnlyStorageProtection;
}
