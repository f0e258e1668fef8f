import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nodeFs from 'fs';
import path from 'path';
import { containsDocument, measureOrWarn, measureTree, reportWarnings } from '../../src/corpus/tree-reporter.js';
import type { FilterReport } from '../../src/corpus/tree-reporter.js';
import { NodeCorpusFileSystem } from '../../src/infra/local/fs/index.js';
import { Err } from '../../src/errors/factories.js';
import { expectOk, expectErr } from '../helpers/result-helpers.js';
import { FakeLogger } from '../helpers/FakeLogger.js';
import { createCorpusFixture } from '../helpers/corpus-fixture.js';
import type { CorpusFixture } from '../helpers/corpus-fixture.js';

const EXT = '.xml.gz';

describe('tree reporter', () => {
  let fixture: CorpusFixture;
  const fs = new NodeCorpusFileSystem();

  beforeEach(() => {
    fixture = createCorpusFixture({
      documents: {
        'en/a/1.xml.gz': 'one',
        'en/b/c/2.xml.gz': 'two22',
        'en/readme.txt': 'hello',
        'zh_cn/notes.txt': 'x',
      },
      manifestLines: [],
    });
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('sums every file and counts only documents', async () => {
    const root = path.join(fixture.corpusRoot, 'en');
    const stats = expectOk(await measureTree(fs, root, EXT), 'measuring');
    expect(stats).toEqual({ root, sizeBytes: 13, documentCount: 2 });
  });

  it('measures a symlinked document as the file it points to', async () => {
    const root = path.join(fixture.corpusRoot, 'en');
    const outside = path.join(fixture.baseDir, 'outside.xml.gz');
    nodeFs.writeFileSync(outside, 'linked');
    nodeFs.symlinkSync(outside, path.join(root, 'a', 'linked.xml.gz'));
    nodeFs.symlinkSync(path.join(fixture.baseDir, 'gone.xml.gz'), path.join(root, 'a', 'dangling.xml.gz'));
    nodeFs.symlinkSync(path.join(root, 'b'), path.join(root, 'loop'));

    const stats = expectOk(await measureTree(fs, root, EXT), 'measuring');

    expect(stats).toEqual({ root, sizeBytes: 19, documentCount: 3 });
  });

  it('fails with an IO error for a missing root', async () => {
    const root = path.join(fixture.corpusRoot, 'fr');
    const error = expectErr(await measureTree(fs, root, EXT), 'measuring missing root');
    expect(error).toMatchObject({ _tag: 'IO', stage: 'report', fsCode: 'FS_NOT_FOUND', path: root });
  });

  it('downgrades an unreadable root to an unavailable figure with a warning', async () => {
    const logger = new FakeLogger();
    const root = path.join(fixture.corpusRoot, 'fr');

    const measurement = expectOk(await measureOrWarn(fs, root, EXT, logger.logger), 'measuring');

    expect(measurement.kind).toBe('unavailable');
    expect(logger.getEntries('warn')).toEqual([
      { level: 'warn', msg: 'Could not measure tree', fields: { root, fsCode: 'FS_NOT_FOUND' } },
    ]);
  });

  describe('containsDocument', () => {
    it('finds a nested document', async () => {
      expect(expectOk(await containsDocument(fs, path.join(fixture.corpusRoot, 'en'), EXT), 'searching')).toBe(true);
    });

    it('is false for a tree without documents', async () => {
      expect(expectOk(await containsDocument(fs, path.join(fixture.corpusRoot, 'zh_cn'), EXT), 'searching')).toBe(false);
    });

    it('is false for a missing root', async () => {
      expect(expectOk(await containsDocument(fs, path.join(fixture.corpusRoot, 'fr'), EXT), 'searching')).toBe(false);
    });
  });

  it('turns each unavailable figure into a warning line', () => {
    const unavailable = Err.io('report', { code: 'FS_NOT_FOUND', path: '/c/tmp/xml/zh_cn', message: 'Not found: /c/tmp/xml/zh_cn' });
    const measured = { kind: 'measured', stats: { root: '/c/xml/en', sizeBytes: 10, documentCount: 1 } } as const;
    const report: FilterReport = {
      source: { language: 'en', before: measured, after: measured },
      target: { language: 'zh_cn', before: measured, after: { kind: 'unavailable', error: unavailable } },
    };

    expect(reportWarnings(report)).toEqual(['zh_cn size/count after filtering unavailable: Not found: /c/tmp/xml/zh_cn']);
  });
});
