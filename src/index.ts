// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, resolveLayout, CORPUS_DIR_NAME, DEFAULT_MANIFEST, DOCUMENT_EXTENSION } from './config/filter-config.js';
export type { FilterConfig, CorpusLayout, ConfigOverrides, LanguageCode } from './config/filter-config.js';

// Pipeline
export { runFilter, projectFilter } from './corpus/filter-pipeline.js';
export type { FilterOutcome, ProjectionOutcome, FilterPorts, ManifestCounts } from './corpus/filter-pipeline.js';
export { readManifest } from './corpus/manifest-reader.js';
export type { Manifest } from './corpus/manifest-reader.js';
export { parseManifestLine, parseManifestText, ALIGNMENT_FORMAT } from './corpus/manifest-parser.js';
export type { ManifestEntry, ManifestFormat } from './corpus/manifest-parser.js';
export { copySelected, verifySources } from './corpus/selective-copier.js';
export { measureTree } from './corpus/tree-reporter.js';
export type { TreeStats, FilterReport, LanguageReport, Measurement } from './corpus/tree-reporter.js';
export { promoteStagedTree } from './corpus/tree-promoter.js';
export { cleanStagingRoot } from './corpus/staging-cleanup.js';
export type { CleanupOutcome } from './corpus/staging-cleanup.js';

// Ports and adapters
export type { CorpusFileSystemPort, FsError, FsErrorCode } from './ports/corpus-fs.port.js';
export { NodeCorpusFileSystem } from './infra/local/fs/index.js';

// Errors
export * from './errors/index.js';
