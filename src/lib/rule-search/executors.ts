import type { Chunk, ExecutorKind } from '../../config/types.js';
import { WORKER_THREADS_ENABLED } from '../constants.js';
import { ErrorCode, ScanError, toErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { scanChunk } from './chunk-scanner.js';
import type { RuleSink } from './sinks.js';
import type { ChunkScanPool, ChunkScanResult } from './worker-pool-types.js';
import { ChunkWorkerPool, isWorkerPoolAvailable } from './worker-pool.js';

/** Runs one chunk scan and reports its match count. */
export interface ChunkExecutor {
  readonly kind: ExecutorKind;
  scan: (chunk: Chunk, serviceName: string, sink: RuleSink) => Promise<number>;
  close: () => Promise<void>;
}

/** Scans chunks on the calling thread; concurrency comes from the event loop. */
export function createInlineExecutor(): ChunkExecutor {
  return {
    kind: 'inline',
    scan: scanChunk,
    close: async () => {},
  };
}

async function scanOnPool(
  pool: ChunkScanPool,
  chunk: Chunk,
  serviceName: string
): Promise<ChunkScanResult> {
  try {
    return await pool.scan(chunk, serviceName);
  } catch (error: unknown) {
    throw ScanError.fromError(ErrorCode.E_WORKER, toErrorMessage(error), error);
  }
}

/**
 * Scans chunks on worker threads. Matched lines come back in chunk order and
 * are forwarded to the sink from the main thread. Pool failures surface as
 * E_WORKER errors; sink failures pass through unchanged.
 */
export function createThreadExecutor(pool: ChunkScanPool): ChunkExecutor {
  return {
    kind: 'threads',
    scan: async (chunk, serviceName, sink) => {
      const { matchCount, matchedLines } = await scanOnPool(
        pool,
        chunk,
        serviceName
      );
      for (const line of matchedLines) {
        await sink.write(line);
      }
      return matchCount;
    },
    close: () => pool.close(),
  };
}

export function createDefaultExecutor(
  workerCount: number,
  logger: Logger
): ChunkExecutor {
  if (!WORKER_THREADS_ENABLED || !isWorkerPoolAvailable()) {
    return createInlineExecutor();
  }
  return createThreadExecutor(
    new ChunkWorkerPool({ size: workerCount, logger })
  );
}
