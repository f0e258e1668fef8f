import type { FilterReport, LanguageReport, Measurement } from '../corpus/tree-reporter.js';
import type { ManifestCounts } from '../corpus/filter-pipeline.js';
import { formatBytes } from '../utils/format-bytes.js';

function sizeOf(m: Measurement): string {
  return m.kind === 'measured' ? formatBytes(m.stats.sizeBytes) : 'unavailable';
}

function countOf(m: Measurement): string {
  return m.kind === 'measured' ? String(m.stats.documentCount) : 'unavailable';
}

/**
 * Before/after figures for both language subtrees: sizes first, then counts.
 * `afterLabel` reads "after" for a real run and "projected" for a dry run.
 */
export function reportLines(report: FilterReport, afterLabel: string = 'after'): string[] {
  const sides: readonly LanguageReport[] = [report.source, report.target];

  return [
    ...sides.flatMap((s) => [
      `${s.language} size before: ${sizeOf(s.before)}`,
      `${s.language} size ${afterLabel}: ${sizeOf(s.after)}`,
    ]),
    ...sides.flatMap((s) => [
      `${s.language} documents before: ${countOf(s.before)}`,
      `${s.language} documents ${afterLabel}: ${countOf(s.after)}`,
    ]),
  ];
}

export function manifestLine(counts: ManifestCounts, report: FilterReport): string {
  return (
    `manifest: ${counts.entries} alignment records in ${counts.linesRead} lines, ` +
    `${counts.distinctSource} distinct ${report.source.language} and ${counts.distinctTarget} distinct ${report.target.language} documents`
  );
}
