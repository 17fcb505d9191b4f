import type { Chunk } from '../../config/types.js';
import { extractMsg, matchesServiceName } from './pattern-extractor.js';
import type { RuleSink } from './sinks.js';

/**
 * Scan one chunk in line order, forwarding every line whose msg field
 * contains `serviceName` to `sink` unchanged.
 *
 * @returns Number of matching lines in the chunk
 */
export async function scanChunk(
  chunk: Chunk,
  serviceName: string,
  sink: RuleSink
): Promise<number> {
  let matched = 0;

  for (const line of chunk) {
    const field = extractMsg(line);
    if (field === undefined || !matchesServiceName(field, serviceName)) {
      continue;
    }

    matched++;
    await sink.write(line);
  }

  return matched;
}
