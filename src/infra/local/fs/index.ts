import * as fs from 'fs/promises';
import type { Stats, Dirent } from 'fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { CorpusFileSystemPort, FsEntryKind, FsEntry, FsError, FsStat } from '../../../ports/corpus-fs.port.js';

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, targetPath: string): FsError {
  const code = nodeErrorCode(e);
  const detail = e instanceof Error ? e.message : String(e);

  switch (code) {
    case 'ENOENT':
      return { code: 'FS_NOT_FOUND', path: targetPath, message: `Not found: ${targetPath}` };
    case 'EEXIST':
      return { code: 'FS_ALREADY_EXISTS', path: targetPath, message: `Already exists: ${targetPath}` };
    case 'ENOTEMPTY':
      return { code: 'FS_NOT_EMPTY', path: targetPath, message: `Directory not empty: ${targetPath}` };
    case 'EACCES':
    case 'EPERM':
      return { code: 'FS_PERMISSION_DENIED', path: targetPath, message: `Permission denied: ${targetPath}` };
    case 'EXDEV':
      return { code: 'FS_CROSS_DEVICE', path: targetPath, message: `Cross-device rename: ${targetPath}` };
    default:
      return { code: 'FS_IO_ERROR', path: targetPath, message: `FS error at ${targetPath}: ${detail}` };
  }
}

function kindOf(entry: Stats | Dirent): FsEntryKind {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  return 'other';
}

export class NodeCorpusFileSystem implements CorpusFileSystemPort {
  stat(targetPath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.stat(targetPath), (e) => mapFsError(e, targetPath)).map((s) => ({
      kind: kindOf(s),
      sizeBytes: s.size,
    }));
  }

  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((entries) =>
      entries.map((d) => ({ name: d.name, kind: kindOf(d) }))
    );
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  copyFile(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.copyFile(fromPath, toPath), (e) =>
      mapFsError(e, nodeErrorCode(e) === 'ENOENT' ? fromPath : toPath)
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  removeTree(targetPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(targetPath, { recursive: true, force: true }), (e) => mapFsError(e, targetPath));
  }
}
