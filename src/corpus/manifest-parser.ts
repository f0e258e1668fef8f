/**
 * Structured parser for alignment manifest lines.
 *
 * A qualifying line looks like
 *
 *   <linkGrp targType="s" fromDoc="en/1999/42/7.xml.gz" toDoc="zh_cn/1999/42/9.xml.gz">
 *
 * Lines without the marker token are not alignment records (XML prolog,
 * `<link>` rows, closing tags) and are skipped.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { DocumentPath } from './document-path.js';
import { parseDocumentPath } from './document-path.js';

export interface ManifestEntry {
  readonly sourcePath: DocumentPath;
  readonly targetPath: DocumentPath;
  readonly lineNumber: number;
}

export interface ManifestFormat {
  /** Token whose presence marks an alignment line. */
  readonly marker: string;
  readonly sourceKey: string;
  readonly targetKey: string;
  /** 1-based whitespace-separated field positions. */
  readonly sourceField: number;
  readonly targetField: number;
}

export const ALIGNMENT_FORMAT: ManifestFormat = {
  marker: 'fromDoc',
  sourceKey: 'fromDoc',
  targetKey: 'toDoc',
  sourceField: 3,
  targetField: 4,
};

export interface ManifestLanguages {
  readonly source: string;
  readonly target: string;
}

/** Parse failure for one line; the reader attaches manifest path and line text. */
export interface LineParseFailure {
  readonly lineNumber: number;
  readonly reason: string;
}

/**
 * Decode a `key="value"` token. The closing quote may be followed by `>` when
 * the attribute ends the element.
 */
export function decodeAttribute(field: string, key: string, allowTagClose: boolean): Result<string, string> {
  const prefix = `${key}="`;
  if (!field.startsWith(prefix)) {
    return err(`expected ${prefix}..." but found ${field}`);
  }

  const rest = field.slice(prefix.length);
  let value: string;
  if (allowTagClose && rest.endsWith('">')) {
    value = rest.slice(0, -2);
  } else if (rest.endsWith('"')) {
    value = rest.slice(0, -1);
  } else {
    return err(`missing closing quote in ${field}`);
  }

  if (value.includes('"')) {
    return err(`unexpected quote inside ${key} value: ${field}`);
  }
  return ok(value);
}

/**
 * Returns `null` for a line without the marker, an entry for a well-formed
 * alignment line, and a failure for anything in between.
 */
export function parseManifestLine(
  line: string,
  lineNumber: number,
  languages: ManifestLanguages,
  format: ManifestFormat = ALIGNMENT_FORMAT
): Result<ManifestEntry | null, LineParseFailure> {
  if (!line.includes(format.marker)) return ok(null);

  const fail = (reason: string): Result<never, LineParseFailure> => err({ lineNumber, reason });

  const fields = line.trim().split(/\s+/);
  const needed = Math.max(format.sourceField, format.targetField);
  if (fields.length < needed) {
    return fail(`expected at least ${needed} fields, found ${fields.length}`);
  }

  const sourceField = fields[format.sourceField - 1] ?? '';
  const targetField = fields[format.targetField - 1] ?? '';

  const sourceValue = decodeAttribute(sourceField, format.sourceKey, false);
  if (sourceValue.isErr()) return fail(sourceValue.error);

  const targetValue = decodeAttribute(targetField, format.targetKey, true);
  if (targetValue.isErr()) return fail(targetValue.error);

  const sourcePath = parseDocumentPath(sourceValue.value, languages.source);
  if (sourcePath.isErr()) return fail(`${format.sourceKey}: ${sourcePath.error}`);

  const targetPath = parseDocumentPath(targetValue.value, languages.target);
  if (targetPath.isErr()) return fail(`${format.targetKey}: ${targetPath.error}`);

  return ok({ sourcePath: sourcePath.value, targetPath: targetPath.value, lineNumber });
}

/**
 * Parse a whole manifest held in memory. Stops at the first malformed line.
 * The streaming reader applies the same rules line by line.
 */
export function parseManifestText(
  text: string,
  languages: ManifestLanguages,
  format: ManifestFormat = ALIGNMENT_FORMAT
): Result<readonly ManifestEntry[], LineParseFailure> {
  const entries: ManifestEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    const parsed = parseManifestLine(line, index + 1, languages, format);
    if (parsed.isErr()) return err(parsed.error);
    if (parsed.value !== null) entries.push(parsed.value);
  }

  return ok(entries);
}

/** Distinct paths in first-seen order. */
export function distinctPaths(entries: readonly ManifestEntry[], side: 'source' | 'target'): readonly DocumentPath[] {
  const seen = new Set<DocumentPath>();
  for (const entry of entries) {
    seen.add(side === 'source' ? entry.sourcePath : entry.targetPath);
  }
  return [...seen];
}
