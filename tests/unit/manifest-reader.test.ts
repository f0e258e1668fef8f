import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { gzipSync } from 'zlib';
import { readManifest } from '../../src/corpus/manifest-reader.js';
import { expectOk, expectErr } from '../helpers/result-helpers.js';
import { FakeLogger } from '../helpers/FakeLogger.js';
import { alignmentLine, createCorpusFixture } from '../helpers/corpus-fixture.js';
import type { CorpusFixture } from '../helpers/corpus-fixture.js';

const languages = { source: 'en', target: 'zh_cn' };

const ALIGNMENT_FILE = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<cesAlign version="1.0">',
  alignmentLine('en/a/1.xml.gz', 'zh_cn/a/1.xml.gz'),
  '<link xtargets="1;1" />',
  alignmentLine('en/b/2.xml.gz', 'zh_cn/b/2.xml.gz'),
  '</cesAlign>',
];

describe('readManifest', () => {
  let fixture: CorpusFixture | undefined;

  afterEach(() => {
    fixture?.cleanup();
    fixture = undefined;
  });

  it('streams a plain-text manifest', async () => {
    fixture = createCorpusFixture({ documents: {}, manifestLines: ALIGNMENT_FILE });
    const logger = new FakeLogger();

    const manifest = expectOk(
      await readManifest({ manifestPath: fixture.manifestPath, languages, logger: logger.logger }),
      'reading plain manifest'
    );

    expect(manifest.compressed).toBe(false);
    expect(manifest.linesRead).toBe(6);
    expect(manifest.entries).toEqual([
      { sourcePath: 'en/a/1.xml.gz', targetPath: 'zh_cn/a/1.xml.gz', lineNumber: 3 },
      { sourcePath: 'en/b/2.xml.gz', targetPath: 'zh_cn/b/2.xml.gz', lineNumber: 5 },
    ]);
    expect(logger.hasEntry('info', 'Manifest parsed')).toBe(true);
  });

  it('decompresses a gzip manifest detected by its magic bytes', async () => {
    fixture = createCorpusFixture({ documents: {}, manifestLines: ALIGNMENT_FILE, gzipManifest: true });

    const manifest = expectOk(
      await readManifest({ manifestPath: fixture.manifestPath, languages, logger: new FakeLogger().logger }),
      'reading gzip manifest'
    );

    expect(manifest.compressed).toBe(true);
    expect(manifest.entries.map((e) => e.targetPath)).toEqual(['zh_cn/a/1.xml.gz', 'zh_cn/b/2.xml.gz']);
  });

  it('reports the first malformed line with its text', async () => {
    const bad = '<linkGrp targType="s" fromDoc="en/a/1.xml.gz">';
    fixture = createCorpusFixture({
      documents: {},
      manifestLines: [alignmentLine('en/a/1.xml.gz', 'zh_cn/a/1.xml.gz'), bad],
    });

    const error = expectErr(
      await readManifest({ manifestPath: fixture.manifestPath, languages, logger: new FakeLogger().logger }),
      'reading malformed manifest'
    );

    expect(error).toEqual({
      _tag: 'MalformedManifest',
      manifestPath: fixture.manifestPath,
      lineNumber: 2,
      line: bad,
      reason: 'expected at least 4 fields, found 3',
      message: 'Malformed manifest line 2: expected at least 4 fields, found 3',
    });
  });

  it('rejects a manifest without any alignment record', async () => {
    fixture = createCorpusFixture({ documents: {}, manifestLines: ['<?xml version="1.0"?>', '<cesAlign/>'] });

    const error = expectErr(
      await readManifest({ manifestPath: fixture.manifestPath, languages, logger: new FakeLogger().logger }),
      'reading empty manifest'
    );

    expect(error._tag).toBe('MalformedManifest');
    expect(error.message).toBe('Malformed manifest: no line contains "fromDoc"');
  });

  it('maps a missing manifest to an IO error in the manifest stage', async () => {
    fixture = createCorpusFixture({ documents: {}, manifestLines: [] });
    const missing = path.join(fixture.baseDir, 'absent.xml.gz');

    const error = expectErr(
      await readManifest({ manifestPath: missing, languages, logger: new FakeLogger().logger }),
      'reading missing manifest'
    );

    expect(error).toMatchObject({ _tag: 'IO', stage: 'manifest', fsCode: 'FS_NOT_FOUND', path: missing });
  });

  it('reports a truncated gzip manifest as malformed', async () => {
    fixture = createCorpusFixture({ documents: {}, manifestLines: [] });
    const truncated = path.join(fixture.baseDir, 'truncated.xml.gz');
    fs.writeFileSync(truncated, gzipSync(ALIGNMENT_FILE.join('\n')).subarray(0, 12));

    const error = expectErr(
      await readManifest({ manifestPath: truncated, languages, logger: new FakeLogger().logger }),
      'reading truncated manifest'
    );

    expect(error).toMatchObject({ _tag: 'MalformedManifest', manifestPath: truncated, reason: 'corrupt gzip stream: unexpected end of file' });
    expect(error.message).toBe('Malformed manifest: corrupt gzip stream: unexpected end of file');
  });
});
