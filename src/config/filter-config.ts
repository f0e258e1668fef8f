/**
 * Filter configuration - parse, don't validate.
 *
 * - Environment variables and command-line options meet here, once
 * - zod validates at the boundary and returns typed, branded data
 * - Errors are data (Result), never thrown
 */

import path from 'path';
import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/corpus-error.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Constants
// =============================================================================

/** Name of the corpus directory under the base directory. */
export const CORPUS_DIR_NAME = 'xml';

/** Name given to the detached original tree inside the staging root during a swap. */
export const PREVIOUS_TREE_NAME = 'xml.previous';

export const DOCUMENT_EXTENSION = '.xml.gz';

export const DEFAULT_MANIFEST = 'en-zh_cn.xml.gz.tmp';

// =============================================================================
// Branded primitives
// =============================================================================

export type LanguageCode = Brand<string, 'LanguageCode'>;

export type StagingFailurePolicy = { readonly kind: 'remove' } | { readonly kind: 'keep' };

export interface CorpusLayout {
  /** Directory holding `xml/` and the manifest; the original script's working directory. */
  readonly baseDir: string;
  /** `<base>/xml` */
  readonly corpusRoot: string;
  readonly stagingRoot: string;
  /** `<staging>/xml`: mirrors the corpus root. */
  readonly stagedCorpusRoot: string;
  /** `<staging>/xml.previous`: where the original tree waits during the swap. */
  readonly previousCorpusRoot: string;
}

export interface FilterConfig {
  readonly layout: CorpusLayout;
  readonly manifestPath: string;
  readonly languages: {
    readonly source: LanguageCode;
    readonly target: LanguageCode;
  };
  readonly documentExtension: string;
  readonly onFailure: StagingFailurePolicy;
  readonly logLevel: LogLevel;
}

/** Command-line values; each one that is set wins over its environment variable. */
export interface ConfigOverrides {
  readonly baseDir?: string;
  readonly manifest?: string;
  readonly sourceLang?: string;
  readonly targetLang?: string;
  readonly stagingDir?: string;
  readonly keepStagingOnFailure?: boolean;
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly overrides?: ConfigOverrides;
}

// =============================================================================
// Schema
// =============================================================================

const LanguageCodeSchema = z
  .string()
  .regex(/^[a-z]{2,3}(_[a-z]{2,4})?$/, 'Expected a corpus language code such as "en" or "zh_cn"');

const StagingDirSchema = z
  .string()
  .min(1, 'Staging directory cannot be empty')
  .refine((v) => !path.isAbsolute(v), 'Staging directory must be relative to the base directory')
  .refine((v) => {
    const normalized = path.normalize(v);
    return normalized !== '.' && normalized !== '..' && !normalized.startsWith(`..${path.sep}`);
  }, 'Staging directory must be inside the base directory')
  .refine((v) => {
    const first = path.normalize(v).split(path.sep)[0];
    return first !== CORPUS_DIR_NAME;
  }, `Staging directory cannot be inside the ${CORPUS_DIR_NAME}/ corpus root`);

const EnvSchema = z.object({
  CORPUS_FILTER_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('info')),
  CORPUS_FILTER_MANIFEST: z.string().min(1).default(DEFAULT_MANIFEST),
  CORPUS_FILTER_SOURCE_LANG: LanguageCodeSchema.default('en'),
  CORPUS_FILTER_TARGET_LANG: LanguageCodeSchema.default('zh_cn'),
  CORPUS_FILTER_STAGING_DIR: StagingDirSchema.default('tmp'),
  CORPUS_FILTER_ON_FAILURE: z.enum(['remove', 'keep']).default('remove'),
  CORPUS_FILTER_BASE_DIR: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<FilterConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(mergeOverrides(options.env, options.overrides ?? {}));

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  if (parsed.data.CORPUS_FILTER_SOURCE_LANG === parsed.data.CORPUS_FILTER_TARGET_LANG) {
    return err(
      Err.configInvalid([
        { path: 'CORPUS_FILTER_TARGET_LANG', message: 'Target language must differ from the source language' },
      ])
    );
  }

  return ok(buildConfig(parsed.data, options.cwd));
}

export function resolveLayout(baseDir: string, stagingDir: string): CorpusLayout {
  const base = path.resolve(baseDir);
  const stagingRoot = path.resolve(base, stagingDir);
  return {
    baseDir: base,
    corpusRoot: path.join(base, CORPUS_DIR_NAME),
    stagingRoot,
    stagedCorpusRoot: path.join(stagingRoot, CORPUS_DIR_NAME),
    previousCorpusRoot: path.join(stagingRoot, PREVIOUS_TREE_NAME),
  };
}

// =============================================================================
// Internal
// =============================================================================

function mergeOverrides(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides
): Record<string, string | undefined> {
  return {
    ...env,
    ...(overrides.baseDir !== undefined && { CORPUS_FILTER_BASE_DIR: overrides.baseDir }),
    ...(overrides.manifest !== undefined && { CORPUS_FILTER_MANIFEST: overrides.manifest }),
    ...(overrides.sourceLang !== undefined && { CORPUS_FILTER_SOURCE_LANG: overrides.sourceLang }),
    ...(overrides.targetLang !== undefined && { CORPUS_FILTER_TARGET_LANG: overrides.targetLang }),
    ...(overrides.stagingDir !== undefined && { CORPUS_FILTER_STAGING_DIR: overrides.stagingDir }),
    ...(overrides.keepStagingOnFailure === true && { CORPUS_FILTER_ON_FAILURE: 'keep' }),
  };
}

function buildConfig(env: ParsedEnv, cwd: string): FilterConfig {
  const layout = resolveLayout(path.resolve(cwd, env.CORPUS_FILTER_BASE_DIR ?? '.'), env.CORPUS_FILTER_STAGING_DIR);

  return {
    layout,
    manifestPath: path.resolve(layout.baseDir, env.CORPUS_FILTER_MANIFEST),
    languages: {
      source: env.CORPUS_FILTER_SOURCE_LANG as LanguageCode,
      target: env.CORPUS_FILTER_TARGET_LANG as LanguageCode,
    },
    documentExtension: DOCUMENT_EXTENSION,
    onFailure: env.CORPUS_FILTER_ON_FAILURE === 'keep' ? { kind: 'keep' } : { kind: 'remove' },
    logLevel: env.CORPUS_FILTER_LOG_LEVEL,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
