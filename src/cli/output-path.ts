import { basename, dirname, extname, join } from 'path';

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * `YYMMDD_hhmmss` in local time.
 */
export function formatTimestamp(date: Date): string {
  const yy = pad(date.getFullYear() % 100);
  return `${yy}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * `out/result.txt` becomes `out/result_251019_184600.txt`; a path without an
 * extension gets `.txt`.
 */
export function timestampedPath(outputPath: string, date: Date = new Date()): string {
  const ext = extname(outputPath);
  const stem = basename(outputPath, ext);
  return join(dirname(outputPath), `${stem}_${formatTimestamp(date)}${ext || '.txt'}`);
}
