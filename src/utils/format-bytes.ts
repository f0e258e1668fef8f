const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;

/** Human-readable size with binary multiples, `du -h` style. */
export function formatBytes(bytes: number): string {
  if (bytes < KIB) return `${bytes} B`;
  if (bytes < MIB) return `${(bytes / KIB).toFixed(1)} KB`;
  if (bytes < GIB) return `${(bytes / MIB).toFixed(1)} MB`;
  return `${(bytes / GIB).toFixed(2)} GB`;
}
