import { basename, resolve } from 'path';

/**
 * Caller-supplied reference to a user-selected document.
 *
 * `acquire` resolves the handle to a local, byte-readable path, taking
 * whatever access scope the host platform requires; `release` gives the
 * scope back. The gateway pairs every successful `acquire` with exactly one
 * `release`.
 */
export interface DocumentHandle {
  /** Display label, normally the original file name. */
  readonly name: string;
  acquire(): Promise<string>;
  release(): Promise<void>;
}

/**
 * Handle for a file that is already reachable on the local filesystem and
 * needs no extra access scope.
 */
export function localDocumentHandle(filePath: string): DocumentHandle {
  const absolutePath = resolve(filePath);
  return {
    name: basename(absolutePath),
    acquire: () => Promise.resolve(absolutePath),
    release: () => Promise.resolve(),
  };
}
