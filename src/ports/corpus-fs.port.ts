import type { ResultAsync } from 'neverthrow';

export type FsErrorCode =
  | 'FS_NOT_FOUND'
  | 'FS_ALREADY_EXISTS'
  | 'FS_NOT_EMPTY'
  | 'FS_PERMISSION_DENIED'
  | 'FS_CROSS_DEVICE'
  | 'FS_IO_ERROR';

export interface FsError {
  readonly code: FsErrorCode;
  readonly path: string;
  readonly message: string;
}

export type FsEntryKind = 'file' | 'directory' | 'other';

export interface FsEntry {
  readonly name: string;
  readonly kind: FsEntryKind;
}

export interface FsStat {
  readonly kind: FsEntryKind;
  readonly sizeBytes: number;
}

/**
 * Port: read side of the corpus trees.
 * Used by: selective copier (preflight), tree reporter, staging guard.
 */
export interface TreeReadPort {
  /** Follows symlinks. A missing entry is `FS_NOT_FOUND`. */
  stat(targetPath: string): ResultAsync<FsStat, FsError>;

  /** Entry names with their kind, in no particular order. */
  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError>;
}

/**
 * Port: mutations performed while staging and promoting.
 * Used by: selective copier, tree promoter, staging cleanup.
 */
export interface TreeWritePort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /** Overwrites an existing destination, so a retried copy converges. */
  copyFile(fromPath: string, toPath: string): ResultAsync<void, FsError>;

  /**
   * Single rename(2). Atomic within one filesystem; across filesystems it fails
   * with `FS_CROSS_DEVICE` and changes nothing.
   */
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;

  /** Recursive delete. A missing path is not an error. */
  removeTree(targetPath: string): ResultAsync<void, FsError>;
}

export interface CorpusFileSystemPort extends TreeReadPort, TreeWritePort {}
