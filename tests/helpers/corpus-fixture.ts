import fs from 'fs';
import os from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import type { DocumentPath } from '../../src/corpus/document-path.js';
import { parseDocumentPath } from '../../src/corpus/document-path.js';
import { expectOk } from './result-helpers.js';

/**
 * Throwaway corpus under os.tmpdir():
 *
 *   <base>/xml/<lang>/...      documents (content given per relative path)
 *   <base>/<manifestName>      manifest (plain or gzip)
 */
export interface CorpusFixture {
  readonly baseDir: string;
  readonly corpusRoot: string;
  readonly manifestPath: string;
  /** Relative POSIX paths of every file below `root`, sorted. */
  listFiles(root?: string): string[];
  cleanup(): void;
}

export interface CorpusFixtureOptions {
  readonly documents: Record<string, string>;
  readonly manifestLines: readonly string[];
  readonly manifestName?: string;
  readonly gzipManifest?: boolean;
}

export function alignmentLine(fromDoc: string, toDoc: string): string {
  return `<linkGrp targType="s" fromDoc="${fromDoc}" toDoc="${toDoc}">`;
}

export function createCorpusFixture(options: CorpusFixtureOptions): CorpusFixture {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-filter-test-'));
  const corpusRoot = path.join(baseDir, 'xml');
  fs.mkdirSync(corpusRoot);

  for (const [relative, content] of Object.entries(options.documents)) {
    const target = path.join(corpusRoot, ...relative.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }

  const manifestPath = path.join(baseDir, options.manifestName ?? 'en-zh_cn.xml.gz.tmp');
  const text = options.manifestLines.join('\n') + '\n';
  fs.writeFileSync(manifestPath, options.gzipManifest ? gzipSync(text) : text);

  return {
    baseDir,
    corpusRoot,
    manifestPath,
    listFiles: (root = corpusRoot) => listFiles(root),
    cleanup: () => fs.rmSync(baseDir, { recursive: true, force: true }),
  };
}

export function listFiles(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  const found: string[] = [];
  const walk = (dir: string, prefix: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) walk(path.join(dir, entry.name), relative);
      else found.push(relative);
    }
  };
  walk(root, '');
  return found.sort();
}

/** Parsed DocumentPath for test input; the language is the first segment. */
export function documentPath(raw: string): DocumentPath {
  return expectOk(parseDocumentPath(raw, raw.split('/')[0] ?? ''), `document path ${raw}`);
}
