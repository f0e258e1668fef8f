import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import { createInterface } from 'readline';
import { createGunzip } from 'zlib';
import type { Readable } from 'stream';
import type { Result, ResultAsync } from 'neverthrow';
import { ok, err, ResultAsync as RA } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { ManifestError } from '../errors/corpus-error.js';
import { mapFsError, nodeErrorCode } from '../infra/local/fs/index.js';
import type { ManifestEntry, ManifestFormat, ManifestLanguages } from './manifest-parser.js';
import { ALIGNMENT_FORMAT, parseManifestLine } from './manifest-parser.js';

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export interface Manifest {
  readonly path: string;
  readonly entries: readonly ManifestEntry[];
  readonly linesRead: number;
  readonly compressed: boolean;
}

export interface ReadManifestOptions {
  readonly manifestPath: string;
  readonly languages: ManifestLanguages;
  readonly format?: ManifestFormat;
  readonly logger: Logger;
}

/**
 * Stream the manifest line by line and collect its alignment entries.
 *
 * Gzip input (the `.xml.gz` alignment file as distributed) is detected by its
 * magic bytes and decompressed on the fly. The first malformed line aborts the
 * read. A manifest without a single alignment line is rejected too: promoting
 * an empty staging tree would wipe the corpus.
 */
export function readManifest(options: ReadManifestOptions): ResultAsync<Manifest, ManifestError> {
  const { manifestPath, logger } = options;

  return sniffGzip(manifestPath)
    .andThen((compressed) =>
      RA.fromPromise(scanLines(options, compressed), (e) => scanFailure(e, manifestPath)).andThen((scanned) => scanned)
    )
    .andThen((manifest) => {
      if (manifest.entries.length === 0) {
        return err(Err.malformedManifest(manifestPath, `no line contains "${(options.format ?? ALIGNMENT_FORMAT).marker}"`));
      }
      logger.info(
        { manifest: manifestPath, entries: manifest.entries.length, lines: manifest.linesRead, compressed: manifest.compressed },
        'Manifest parsed'
      );
      return ok(manifest);
    });
}

/** zlib failures (`Z_DATA_ERROR`, `Z_BUF_ERROR`, ...) mean a corrupt manifest, not a filesystem fault. */
function scanFailure(e: unknown, manifestPath: string): ManifestError {
  if (nodeErrorCode(e)?.startsWith('Z_')) {
    const detail = e instanceof Error ? e.message : String(e);
    return Err.malformedManifest(manifestPath, `corrupt gzip stream: ${detail}`);
  }
  return Err.io('manifest', mapFsError(e, manifestPath));
}

function sniffGzip(manifestPath: string): ResultAsync<boolean, ManifestError> {
  return RA.fromPromise(
    (async () => {
      const handle = await fs.open(manifestPath, 'r');
      try {
        const { bytesRead, buffer } = await handle.read(Buffer.alloc(GZIP_MAGIC.length), 0, GZIP_MAGIC.length, 0);
        return bytesRead === GZIP_MAGIC.length && buffer[0] === GZIP_MAGIC[0] && buffer[1] === GZIP_MAGIC[1];
      } finally {
        await handle.close();
      }
    })(),
    (e) => Err.io('manifest', mapFsError(e, manifestPath))
  );
}

async function scanLines(options: ReadManifestOptions, compressed: boolean): Promise<Result<Manifest, ManifestError>> {
  const { manifestPath, languages } = options;
  const format = options.format ?? ALIGNMENT_FORMAT;

  const source = createReadStream(manifestPath);
  const input: Readable = compressed ? source.pipe(createGunzip()) : source;
  if (compressed) {
    source.on('error', (e) => input.destroy(e));
  }

  const lines = createInterface({ input, crlfDelay: Infinity });
  const entries: ManifestEntry[] = [];
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      lineNumber += 1;
      const parsed = parseManifestLine(line, lineNumber, languages, format);
      if (parsed.isErr()) {
        return err(Err.malformedManifest(manifestPath, parsed.error.reason, { lineNumber, line }));
      }
      if (parsed.value !== null) entries.push(parsed.value);
    }
  } finally {
    lines.close();
    input.destroy();
    source.destroy();
  }

  return ok({ path: manifestPath, entries, linesRead: lineNumber, compressed });
}
