import { randomUUID } from 'crypto';
import { constants, type Stats } from 'fs';
import { copyFile, mkdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { extname, join, resolve } from 'path';
import {
  fileNotFound,
  fileTooLarge,
  invalidFileType,
  ioFailure,
  resolveImportLimits,
  scopeAccessFailed,
  silentLogger,
  type ImportLimits,
  type ImportLimitsInput,
  type Logger,
} from '@ledgerlock/types';
import { isNotFound, scanStagingDirectory, type StagedFileInfo } from '../utils/index.js';
import type { DocumentHandle } from './document-handle.js';
import { secureDelete } from './secure-delete.js';
import { defaultStorageProtection, type StorageProtection } from './storage-protection.js';

export const DEFAULT_STAGING_DIR = join(tmpdir(), 'ledgerlock', 'secure-processing');

/** Staged files younger than this are left alone by a purge. */
export const DEFAULT_PURGE_GRACE_MS = 5 * 60 * 1000;

/**
 * Staged paths owned by an in-flight access, across every gateway in the
 * process. Staged names are random UUIDs, so the resolved path is a unique key.
 */
const stagesInUse = new Set<string>();

export interface DocumentGatewayOptions {
  /** Working directory for staged copies (created on demand) */
  stagingDir?: string;
  limits?: ImportLimitsInput;
  protection?: StorageProtection;
  /**
   * Minimum age of a staged file before `purgeStagingArea` destroys it
   * (default: 5 minutes). Covers accesses running in other processes.
   */
  purgeGraceMs?: number;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Gives a body function temporary access to a protected copy of a
 * user-selected document.
 *
 * Every access follows acquire -> validate -> stage -> body -> destroy.
 * Destruction sits in a `finally` around the body, so the staged copy is
 * overwritten and unlinked whether the body returns, throws, or its caller
 * stops waiting. The original document is only ever read.
 */
export class DocumentGateway {
  readonly stagingDir: string;
  readonly limits: ImportLimits;
  private readonly protection: StorageProtection;
  private readonly purgeGraceMs: number;
  private readonly logger: Logger;
  private readonly activeStages = new Set<string>();

  constructor(options: DocumentGatewayOptions = {}) {
    this.stagingDir = resolve(options.stagingDir ?? DEFAULT_STAGING_DIR);
    this.limits = resolveImportLimits(options.limits);
    this.protection = options.protection ?? defaultStorageProtection();
    this.purgeGraceMs = options.purgeGraceMs ?? DEFAULT_PURGE_GRACE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of staged copies currently alive. */
  get activeStageCount(): number {
    return this.activeStages.size;
  }

  async withSecureAccess<T>(
    handle: DocumentHandle,
    body: (stagedPath: string) => Promise<T> | T
  ): Promise<T> {
    let originalPath: string;
    try {
      originalPath = await handle.acquire();
    } catch (error) {
      throw scopeAccessFailed(error);
    }

    try {
      await this.validateFile(originalPath);
      const stagedPath = await this.stage(originalPath);

      try {
        return await body(stagedPath);
      } finally {
        await this.destroy(stagedPath);
      }
    } finally {
      await this.releaseScope(handle);
    }
  }

  /**
   * Check an original document against the hard limits: reachable regular
   * file, size, extension.
   *
   * @returns the file size in bytes
   */
  async validateFile(filePath: string): Promise<number> {
    let fileStat: Stats;
    try {
      fileStat = await stat(filePath);
    } catch (error) {
      if (isNotFound(error)) throw fileNotFound(error);
      throw ioFailure(error);
    }

    if (!fileStat.isFile()) {
      throw fileNotFound();
    }

    if (fileStat.size > this.limits.maxFileSizeBytes) {
      throw fileTooLarge(fileStat.size, this.limits.maxFileSizeBytes);
    }

    const extension = extname(filePath).toLowerCase();
    if (!this.limits.allowedExtensions.includes(extension)) {
      throw invalidFileType(extension.replace(/^\./, ''));
    }

    return fileStat.size;
  }

  /**
   * Securely destroy every leftover file in the staging directory, e.g. after
   * a crash. Files staged by an in-flight access of any gateway in this
   * process are skipped, and so are files younger than the grace period.
   *
   * @returns number of files destroyed
   */
  async purgeStagingArea(): Promise<number> {
    let files: StagedFileInfo[];
    try {
      files = await scanStagingDirectory(this.stagingDir);
    } catch (error) {
      throw ioFailure(error);
    }

    const cutoff = Date.now() - this.purgeGraceMs;
    let destroyed = 0;
    for (const file of files) {
      if (stagesInUse.has(resolve(file.filePath))) continue;
      if (file.modifiedAt.getTime() > cutoff) continue;

      try {
        if (await secureDelete(file.filePath, this.limits.overwriteBytes)) {
          destroyed++;
        }
      } catch (error) {
        this.logger.warn('Failed to purge staged file', { file: file.fileName, error: describeError(error) });
      }
    }

    this.logger.debug('Staging area purged', { destroyed, skipped: files.length - destroyed });
    return destroyed;
  }

  private async ensureStagingDirectory(): Promise<void> {
    try {
      await mkdir(this.stagingDir, { recursive: true, mode: 0o700 });
      await this.protection.protectDirectory(this.stagingDir);
    } catch (error) {
      throw ioFailure(error);
    }
  }

  private async stage(originalPath: string): Promise<string> {
    await this.ensureStagingDirectory();

    const stagedPath = join(this.stagingDir, `${randomUUID()}${extname(originalPath).toLowerCase()}`);
    this.activeStages.add(stagedPath);
    stagesInUse.add(stagedPath);

    try {
      await copyFile(originalPath, stagedPath, constants.COPYFILE_EXCL);
      await this.protection.protectFile(stagedPath);
    } catch (error) {
      await this.destroy(stagedPath);
      throw ioFailure(error);
    }

    this.logger.debug('Document staged', { protection: this.protection.name });
    return stagedPath;
  }

  /**
   * Never throws. If the overwrite fails the file is still removed; if even
   * that fails the path is left for `purgeStagingArea`.
   */
  private async destroy(stagedPath: string): Promise<void> {
    try {
      await secureDelete(stagedPath, this.limits.overwriteBytes);
    } catch (error) {
      this.logger.warn('Secure deletion of staged document failed', { error: describeError(error) });
      try {
        await rm(stagedPath, { force: true });
      } catch (rmError) {
        this.logger.error('Staged document could not be removed', { error: describeError(rmError) });
      }
    } finally {
      this.activeStages.delete(stagedPath);
      stagesInUse.delete(stagedPath);
    }
  }

  private async releaseScope(handle: DocumentHandle): Promise<void> {
    try {
      await handle.release();
    } catch (error) {
      this.logger.warn('Releasing document access scope failed', { error: describeError(error) });
    }
  }
}
