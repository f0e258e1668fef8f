import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err, okAsync, ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { TreeReadPort } from '../ports/corpus-fs.port.js';
import { Err } from '../errors/factories.js';
import type { FilterStage, IOError } from '../errors/corpus-error.js';

export interface TreeStats {
  readonly root: string;
  /** Apparent size of every regular file below the root, symlinked files included. */
  readonly sizeBytes: number;
  /** Files whose name ends with the document extension. */
  readonly documentCount: number;
}

export type Measurement =
  | { readonly kind: 'measured'; readonly stats: TreeStats }
  | { readonly kind: 'unavailable'; readonly error: IOError };

export interface LanguageReport {
  readonly language: string;
  readonly before: Measurement;
  readonly after: Measurement;
}

export interface FilterReport {
  readonly source: LanguageReport;
  readonly target: LanguageReport;
}

export interface ReportRoots {
  readonly language: string;
  readonly originalRoot: string;
  readonly stagedRoot: string;
}

/**
 * Walk `root` depth-first, summing file sizes and counting documents.
 * Fails with an IOError when the root or any directory below it is unreadable.
 */
export function measureTree(
  fs: TreeReadPort,
  root: string,
  documentExtension: string,
  stage: FilterStage = 'report'
): ResultAsync<TreeStats, IOError> {
  return new ResultAsync(walk(fs, root, documentExtension, stage));
}

async function walk(
  fs: TreeReadPort,
  root: string,
  documentExtension: string,
  stage: FilterStage
): Promise<Result<TreeStats, IOError>> {
  let sizeBytes = 0;
  let documentCount = 0;
  const pending: string[] = [root];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    const entries = await fs.readdir(dir);
    if (entries.isErr()) return err(Err.io(stage, entries.error));

    for (const entry of entries.value) {
      const full = path.join(dir, entry.name);
      if (entry.kind === 'directory') {
        pending.push(full);
      } else if (entry.kind === 'file') {
        const stat = await fs.stat(full);
        if (stat.isErr()) return err(Err.io(stage, stat.error));
        sizeBytes += stat.value.sizeBytes;
        if (entry.name.endsWith(documentExtension)) documentCount += 1;
      } else if (entry.kind === 'other') {
        // Symlinks count as the file they resolve to, the way the copier reads them.
        // Linked directories and dangling links are skipped.
        const stat = await fs.stat(full);
        if (stat.isErr()) {
          if (stat.error.code === 'FS_NOT_FOUND') continue;
          return err(Err.io(stage, stat.error));
        }
        if (stat.value.kind !== 'file') continue;
        sizeBytes += stat.value.sizeBytes;
        if (entry.name.endsWith(documentExtension)) documentCount += 1;
      }
    }
  }

  return ok({ root, sizeBytes, documentCount });
}

/**
 * True as soon as one document is found below `root`.
 * A missing root counts as empty.
 */
export function containsDocument(fs: TreeReadPort, root: string, documentExtension: string): ResultAsync<boolean, IOError> {
  return new ResultAsync(findFirstDocument(fs, root, documentExtension));
}

async function findFirstDocument(fs: TreeReadPort, root: string, documentExtension: string): Promise<Result<boolean, IOError>> {
  const pending: string[] = [root];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    const entries = await fs.readdir(dir);
    if (entries.isErr()) {
      if (entries.error.code === 'FS_NOT_FOUND' && dir === root) return ok(false);
      return err(Err.io('promote', entries.error));
    }

    for (const entry of entries.value) {
      if (entry.kind === 'file' && entry.name.endsWith(documentExtension)) return ok(true);
      if (entry.kind === 'directory') pending.push(path.join(dir, entry.name));
    }
  }

  return ok(false);
}

/**
 * Measurements never fail the run: an unreadable root becomes `unavailable`
 * and is logged as a warning.
 */
export function measureOrWarn(
  fs: TreeReadPort,
  root: string,
  documentExtension: string,
  logger: Logger
): ResultAsync<Measurement, never> {
  return measureTree(fs, root, documentExtension)
    .map((stats): Measurement => ({ kind: 'measured', stats }))
    .orElse((error) => {
      logger.warn({ root, fsCode: error.fsCode }, 'Could not measure tree');
      return okAsync<Measurement, never>({ kind: 'unavailable', error });
    });
}

export function reportLanguage(
  fs: TreeReadPort,
  roots: ReportRoots,
  documentExtension: string,
  logger: Logger
): ResultAsync<LanguageReport, never> {
  return measureOrWarn(fs, roots.originalRoot, documentExtension, logger).andThen((before) =>
    measureOrWarn(fs, roots.stagedRoot, documentExtension, logger).map((after) => ({
      language: roots.language,
      before,
      after,
    }))
  );
}

/** Warnings for every figure that could not be measured. */
export function reportWarnings(report: FilterReport): readonly string[] {
  const warnings: string[] = [];
  for (const side of [report.source, report.target]) {
    for (const [label, measurement] of [['before', side.before], ['after', side.after]] as const) {
      if (measurement.kind === 'unavailable') {
        warnings.push(`${side.language} size/count ${label} filtering unavailable: ${measurement.error.message}`);
      }
    }
  }
  return warnings;
}
