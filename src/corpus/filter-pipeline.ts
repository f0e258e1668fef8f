/**
 * The filter run, end to end:
 *
 *   claim staging → read manifest → verify + copy → report → promote
 *
 * Everything before promotion leaves the corpus root untouched; on failure the
 * staging root is removed or kept according to `onFailure`. Report failures are
 * warnings. Promotion failures are fatal and never retried.
 */

import path from 'path';
import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { CorpusFileSystemPort } from '../ports/corpus-fs.port.js';
import type { FilterConfig } from '../config/filter-config.js';
import type { FilterError } from '../errors/corpus-error.js';
import type { Manifest } from './manifest-reader.js';
import { readManifest } from './manifest-reader.js';
import { distinctPaths } from './manifest-parser.js';
import type { CopySummary } from './selective-copier.js';
import { copySelected, verifySources } from './selective-copier.js';
import type { FilterReport, LanguageReport, Measurement, ReportRoots } from './tree-reporter.js';
import { measureOrWarn, reportLanguage, reportWarnings } from './tree-reporter.js';
import { claimStagingRoot } from './staging-guard.js';
import { promoteStagedTree } from './tree-promoter.js';
import type { DocumentPath } from './document-path.js';
import { languageOf } from './document-path.js';

export interface FilterPorts {
  readonly fs: CorpusFileSystemPort;
  readonly logger: Logger;
}

export interface ManifestCounts {
  readonly entries: number;
  readonly linesRead: number;
  readonly distinctSource: number;
  readonly distinctTarget: number;
}

export interface FilterOutcome {
  readonly manifest: ManifestCounts;
  readonly copy: CopySummary;
  readonly report: FilterReport;
  readonly warnings: readonly string[];
}

export interface ProjectionOutcome {
  readonly manifest: ManifestCounts;
  readonly report: FilterReport;
  readonly warnings: readonly string[];
}

function countManifest(manifest: Manifest): ManifestCounts {
  return {
    entries: manifest.entries.length,
    linesRead: manifest.linesRead,
    distinctSource: distinctPaths(manifest.entries, 'source').length,
    distinctTarget: distinctPaths(manifest.entries, 'target').length,
  };
}

function loadManifest(config: FilterConfig, logger: Logger): ResultAsync<Manifest, FilterError> {
  return readManifest({
    manifestPath: config.manifestPath,
    languages: config.languages,
    logger: logger.child({ stage: 'manifest' }),
  });
}

function languageRoots(config: FilterConfig, language: string): ReportRoots {
  return {
    language,
    originalRoot: path.join(config.layout.corpusRoot, language),
    stagedRoot: path.join(config.layout.stagedCorpusRoot, language),
  };
}

/** Stage the filtered tree and measure it. No step here touches the corpus root. */
function stageFilteredTree(
  config: FilterConfig,
  ports: FilterPorts
): ResultAsync<Omit<FilterOutcome, 'warnings'>, FilterError> {
  const { fs, logger } = ports;
  const { layout, languages, documentExtension } = config;

  return loadManifest(config, logger).andThen((manifest) =>
    copySelected(fs, {
      sourceRoot: layout.corpusRoot,
      stagingRoot: layout.stagedCorpusRoot,
      paths: [...distinctPaths(manifest.entries, 'source'), ...distinctPaths(manifest.entries, 'target')],
      logger: logger.child({ stage: 'copy' }),
    }).andThen((copy) => {
      const reportLogger = logger.child({ stage: 'report' });
      return reportLanguage(fs, languageRoots(config, languages.source), documentExtension, reportLogger).andThen(
        (source) =>
          reportLanguage(fs, languageRoots(config, languages.target), documentExtension, reportLogger).map((target) => ({
            manifest: countManifest(manifest),
            copy,
            report: { source, target },
          }))
      );
    })
  );
}

function discardStaging(config: FilterConfig, ports: FilterPorts, error: FilterError): ResultAsync<never, FilterError> {
  const { fs, logger } = ports;
  const { stagingRoot } = config.layout;

  if (config.onFailure.kind === 'keep') {
    logger.warn({ stagingRoot }, 'Run aborted; staging root kept for inspection');
    return errAsync(error);
  }

  return fs
    .removeTree(stagingRoot)
    .orElse((cleanupError) => {
      logger.warn({ stagingRoot, err: cleanupError }, 'Run aborted and the staging root could not be removed');
      return okAsync(undefined);
    })
    .andThen(() => errAsync(error));
}

export function runFilter(config: FilterConfig, ports: FilterPorts): ResultAsync<FilterOutcome, FilterError> {
  const { fs, logger } = ports;
  const { layout, languages, documentExtension } = config;

  logger.info(
    { base: layout.baseDir, manifest: config.manifestPath, source: languages.source, target: languages.target },
    'Filter run started'
  );

  return claimStagingRoot(fs, layout)
    .andThen(() => stageFilteredTree(config, ports).orElse((e) => discardStaging(config, ports, e)))
    .andThen((staged) =>
      promoteStagedTree(fs, {
        layout,
        languages: [languages.source, languages.target],
        documentExtension,
        logger: logger.child({ stage: 'promote' }),
      })
        .mapErr((e): FilterError => {
          logger.fatal({ step: e.step, corpusState: e.corpusState, hint: e.recoveryHint }, e.message);
          return e;
        })
        .map((promotion): FilterOutcome => {
          const warnings = [...reportWarnings(staged.report)];
          if (promotion.leftover !== undefined) {
            warnings.push(`Staging root could not be removed after promotion: ${promotion.leftover}`);
          }
          logger.info({ copied: staged.copy.copied, bytes: staged.copy.bytes }, 'Filter run finished');
          return { ...staged, warnings };
        })
    );
}

function projectedMeasurement(
  root: string,
  files: ReadonlyMap<DocumentPath, number>,
  language: string,
  documentExtension: string
): Measurement {
  let sizeBytes = 0;
  let documentCount = 0;
  for (const [documentPath, size] of files) {
    if (languageOf(documentPath) !== language) continue;
    sizeBytes += size;
    if (documentPath.endsWith(documentExtension)) documentCount += 1;
  }
  return { kind: 'measured', stats: { root, sizeBytes, documentCount } };
}

/**
 * Dry run: parse the manifest, verify every referenced file and project the
 * after-filter figures from the referenced files' sizes. Writes nothing.
 */
export function projectFilter(config: FilterConfig, ports: FilterPorts): ResultAsync<ProjectionOutcome, FilterError> {
  const { fs, logger } = ports;
  const { layout, languages, documentExtension } = config;

  return loadManifest(config, logger).andThen((manifest) =>
    verifySources(fs, layout.corpusRoot, [
      ...distinctPaths(manifest.entries, 'source'),
      ...distinctPaths(manifest.entries, 'target'),
    ]).andThen(({ files }) => {
      const side = (language: string): ResultAsync<LanguageReport, never> => {
        const roots = languageRoots(config, language);
        return measureOrWarn(fs, roots.originalRoot, documentExtension, logger).map((before) => ({
          language,
          before,
          after: projectedMeasurement(roots.stagedRoot, files, language, documentExtension),
        }));
      };

      return side(languages.source).andThen((source) =>
        side(languages.target).map((target) => {
          const report = { source, target };
          return { manifest: countManifest(manifest), report, warnings: reportWarnings(report) };
        })
      );
    })
  );
}
