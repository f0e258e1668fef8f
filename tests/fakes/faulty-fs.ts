import type { ResultAsync } from 'neverthrow';
import { errAsync } from 'neverthrow';
import type { CorpusFileSystemPort, FsEntry, FsError, FsErrorCode, FsStat } from '../../src/ports/corpus-fs.port.js';
import { NodeCorpusFileSystem } from '../../src/infra/local/fs/index.js';

type Operation = keyof CorpusFileSystemPort;

interface Fault {
  readonly operation: Operation;
  readonly matches: (firstPath: string) => boolean;
  readonly code: FsErrorCode;
}

/**
 * Real filesystem with scripted failures.
 * A fault fires for every call of its operation whose first path argument matches.
 */
export class FaultyFileSystem implements CorpusFileSystemPort {
  private readonly inner = new NodeCorpusFileSystem();
  private readonly faults: Fault[] = [];
  readonly calls: Array<{ operation: Operation; path: string }> = [];

  failOn(operation: Operation, matches: string | ((p: string) => boolean), code: FsErrorCode = 'FS_IO_ERROR'): this {
    this.faults.push({
      operation,
      matches: typeof matches === 'string' ? (p) => p === matches : matches,
      code,
    });
    return this;
  }

  private fault(operation: Operation, target: string): FsError | null {
    this.calls.push({ operation, path: target });
    const hit = this.faults.find((f) => f.operation === operation && f.matches(target));
    return hit ? { code: hit.code, path: target, message: `injected ${hit.code} on ${operation} ${target}` } : null;
  }

  stat(targetPath: string): ResultAsync<FsStat, FsError> {
    const e = this.fault('stat', targetPath);
    return e ? errAsync(e) : this.inner.stat(targetPath);
  }

  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError> {
    const e = this.fault('readdir', dirPath);
    return e ? errAsync(e) : this.inner.readdir(dirPath);
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    const e = this.fault('mkdirp', dirPath);
    return e ? errAsync(e) : this.inner.mkdirp(dirPath);
  }

  copyFile(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    const e = this.fault('copyFile', fromPath);
    return e ? errAsync(e) : this.inner.copyFile(fromPath, toPath);
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    const e = this.fault('rename', fromPath);
    return e ? errAsync(e) : this.inner.rename(fromPath, toPath);
  }

  removeTree(targetPath: string): ResultAsync<void, FsError> {
    const e = this.fault('removeTree', targetPath);
    return e ? errAsync(e) : this.inner.removeTree(targetPath);
  }
}
