import type { Chunk, RuleLine } from '../../config/types.js';
import { ErrorCode, ScanError } from '../errors.js';

/**
 * Split `lines` into exactly `count` contiguous chunks whose sizes differ by
 * at most one line. The first `lines.length % count` chunks carry the extra
 * line; chunks past the end of the input are empty.
 */
export function partitionLines(
  lines: readonly RuleLine[],
  count: number
): Chunk[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new ScanError(
      ErrorCode.E_INVALID_CONFIG,
      `Chunk count must be a positive integer, got ${String(count)}`
    );
  }

  const base = Math.floor(lines.length / count);
  const remainder = lines.length % count;
  const chunks: Chunk[] = [];
  let start = 0;

  for (let i = 0; i < count; i++) {
    const end = start + base + (i < remainder ? 1 : 0);
    chunks.push(lines.slice(start, end));
    start = end;
  }

  return chunks;
}
