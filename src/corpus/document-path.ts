import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';

/**
 * POSIX path of one document relative to the corpus root, e.g. `en/1999/42/7.xml.gz`.
 * The first segment is the language subtree the document belongs to.
 */
export type DocumentPath = Brand<string, 'DocumentPath'>;

export function parseDocumentPath(raw: string, language: string): Result<DocumentPath, string> {
  if (raw.length === 0) return err('document path is empty');
  if (raw.startsWith('/')) return err(`document path must be relative: ${raw}`);
  if (raw.includes('\\')) return err(`document path must use "/" separators: ${raw}`);

  const segments = raw.split('/');
  if (segments.some((s) => s === '' || s === '.' || s === '..')) {
    return err(`document path has an empty, "." or ".." segment: ${raw}`);
  }
  if (segments.length < 2 || segments[0] !== language) {
    return err(`document path is outside the ${language}/ subtree: ${raw}`);
  }

  return ok(raw as DocumentPath);
}

/** Language subtree a parsed path belongs to. */
export function languageOf(documentPath: DocumentPath): string {
  const slash = documentPath.indexOf('/');
  return documentPath.slice(0, slash);
}
