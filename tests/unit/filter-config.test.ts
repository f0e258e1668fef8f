import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../../src/config/filter-config.js';
import { expectOk, expectErr } from '../helpers/result-helpers.js';

const cwd = path.resolve('/srv/corpus');

describe('loadConfig', () => {
  it('applies defaults relative to the working directory', () => {
    const config = expectOk(loadConfig({ env: {}, cwd }), 'loading defaults');

    expect(config).toEqual({
      layout: {
        baseDir: cwd,
        corpusRoot: path.join(cwd, 'xml'),
        stagingRoot: path.join(cwd, 'tmp'),
        stagedCorpusRoot: path.join(cwd, 'tmp', 'xml'),
        previousCorpusRoot: path.join(cwd, 'tmp', 'xml.previous'),
      },
      manifestPath: path.join(cwd, 'en-zh_cn.xml.gz.tmp'),
      languages: { source: 'en', target: 'zh_cn' },
      documentExtension: '.xml.gz',
      onFailure: { kind: 'remove' },
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = expectOk(
      loadConfig({
        env: {
          CORPUS_FILTER_LOG_LEVEL: 'DEBUG',
          CORPUS_FILTER_MANIFEST: 'de-fr.xml.gz',
          CORPUS_FILTER_SOURCE_LANG: 'de',
          CORPUS_FILTER_TARGET_LANG: 'fr',
          CORPUS_FILTER_STAGING_DIR: 'work/stage',
          CORPUS_FILTER_ON_FAILURE: 'keep',
          CORPUS_FILTER_BASE_DIR: 'data',
        },
        cwd,
      }),
      'loading env'
    );

    expect(config.logLevel).toBe('debug');
    expect(config.layout.baseDir).toBe(path.join(cwd, 'data'));
    expect(config.layout.stagingRoot).toBe(path.join(cwd, 'data', 'work', 'stage'));
    expect(config.manifestPath).toBe(path.join(cwd, 'data', 'de-fr.xml.gz'));
    expect(config.languages).toEqual({ source: 'de', target: 'fr' });
    expect(config.onFailure).toEqual({ kind: 'keep' });
  });

  it('lets command-line values win over the environment', () => {
    const config = expectOk(
      loadConfig({
        env: { CORPUS_FILTER_SOURCE_LANG: 'de', CORPUS_FILTER_STAGING_DIR: 'stage' },
        cwd,
        overrides: { sourceLang: 'ja', stagingDir: 'other', baseDir: '/mnt/c', keepStagingOnFailure: true },
      }),
      'loading overrides'
    );

    expect(config.languages.source).toBe('ja');
    expect(config.layout.stagingRoot).toBe(path.resolve('/mnt/c', 'other'));
    expect(config.onFailure).toEqual({ kind: 'keep' });
  });

  it('rejects identical source and target languages', () => {
    const error = expectErr(loadConfig({ env: { CORPUS_FILTER_TARGET_LANG: 'en' }, cwd }), 'loading');
    expect(error.issues).toEqual([
      { path: 'CORPUS_FILTER_TARGET_LANG', message: 'Target language must differ from the source language' },
    ]);
  });

  it('lists every invalid value', () => {
    const error = expectErr(
      loadConfig({ env: { CORPUS_FILTER_SOURCE_LANG: 'EN', CORPUS_FILTER_ON_FAILURE: 'retry' }, cwd }),
      'loading'
    );

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues.map((i) => i.path).sort()).toEqual(['CORPUS_FILTER_ON_FAILURE', 'CORPUS_FILTER_SOURCE_LANG']);
  });

  it.each([
    ['../outside', 'Staging directory must be inside the base directory'],
    ['/tmp/stage', 'Staging directory must be relative to the base directory'],
    ['xml/stage', 'Staging directory cannot be inside the xml/ corpus root'],
    ['.', 'Staging directory must be inside the base directory'],
  ])('rejects staging directory %j', (stagingDir, message) => {
    const error = expectErr(loadConfig({ env: {}, cwd, overrides: { stagingDir } }), 'loading');
    expect(error.issues).toEqual([{ path: 'CORPUS_FILTER_STAGING_DIR', message }]);
  });
});
