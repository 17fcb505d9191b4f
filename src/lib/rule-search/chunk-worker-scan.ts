import { scanChunk } from './chunk-scanner.js';
import { createCollectingSink } from './sinks.js';
import type {
  ChunkScanErrorResponse,
  ChunkScanRequest,
  ChunkScanResponse,
} from './worker-pool-types.js';

/**
 * Scan a chunk inside a worker thread. Matched lines travel back to the main
 * thread, which owns the sink.
 */
export async function handleChunkScanRequest(
  request: ChunkScanRequest
): Promise<ChunkScanResponse | ChunkScanErrorResponse> {
  const sink = createCollectingSink();
  try {
    const matchCount = await scanChunk(
      request.lines,
      request.serviceName,
      sink
    );
    return {
      type: 'result',
      id: request.id,
      result: { matchCount, matchedLines: [...sink.lines] },
    };
  } catch (error: unknown) {
    return {
      type: 'error',
      id: request.id,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
