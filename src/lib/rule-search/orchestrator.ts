import type {
  Chunk,
  ChunkFailure,
  RuleLine,
  ScanConfig,
  ScanOutcome,
  ScanSummary,
} from '../../config/types.js';
import { ErrorCode, ScanError } from '../errors.js';
import { assertNotAborted } from '../fs-helpers/abort.js';
import { processInParallel } from '../fs-helpers/concurrency.js';
import { loadRuleLines } from '../fs-helpers/read-lines.js';
import type { Logger } from '../logger.js';
import { withScanDiagnostics } from '../observability/diagnostics.js';
import {
  type ChunkExecutor,
  createDefaultExecutor,
  createInlineExecutor,
} from './executors.js';
import { partitionLines } from './partition.js';
import { createRuleSink, type RuleSink } from './sinks.js';

export interface ScanRuleLinesOptions {
  serviceName: string;
  workerCount: number;
  sink: RuleSink;
  logger: Logger;
  executor?: ChunkExecutor;
  signal?: AbortSignal;
}

export interface RunScanDeps {
  logger: Logger;
  signal?: AbortSignal;
  /** Overrides the chunk executor picked from the environment. */
  executor?: ChunkExecutor;
  /** Overrides the sink built from `config.output`. */
  sink?: RuleSink;
}

function validateServiceName(serviceName: string): void {
  if (serviceName.length > 0) return;
  throw new ScanError(
    ErrorCode.E_INVALID_CONFIG,
    'No service name provided',
    undefined,
    { serviceName }
  );
}

function validateWorkerCount(workerCount: number): void {
  if (Number.isInteger(workerCount) && workerCount >= 1) return;
  throw new ScanError(
    ErrorCode.E_INVALID_CONFIG,
    `Worker count must be a positive integer, got ${String(workerCount)}`,
    undefined,
    { workerCount }
  );
}

interface IndexedChunk {
  index: number;
  lines: Chunk;
}

function toDispatchableChunks(chunks: readonly Chunk[]): IndexedChunk[] {
  return chunks
    .map((lines, index) => ({ index, lines }))
    .filter((chunk) => chunk.lines.length > 0);
}

async function scanValidatedLines(
  lines: readonly RuleLine[],
  options: ScanRuleLinesOptions
): Promise<ScanOutcome> {
  const { serviceName, workerCount, sink, logger, signal } = options;
  const executor = options.executor ?? createInlineExecutor();
  const dispatchable = toDispatchableChunks(
    partitionLines(lines, workerCount)
  );

  const { results, errors } = await processInParallel(
    dispatchable,
    async (chunk) => await executor.scan(chunk.lines, serviceName, sink),
    workerCount,
    signal
  );

  const failures: ChunkFailure[] = errors.map(({ index, error }) => {
    const chunk = dispatchable[index];
    const failure: ChunkFailure = {
      chunkIndex: chunk?.index ?? index,
      lineCount: chunk?.lines.length ?? 0,
      message: error.message,
    };
    logger.error(
      `Error in worker for chunk ${String(failure.chunkIndex)}: ${failure.message}`
    );
    return failure;
  });

  let totalMatches = 0;
  let linesScanned = 0;
  for (const { index, value } of results) {
    totalMatches += value;
    linesScanned += dispatchable[index]?.lines.length ?? 0;
  }

  logger.info(
    `Total matches ${String(totalMatches)} for the service name ${serviceName}`
  );

  return {
    totalMatches,
    linesScanned,
    chunksDispatched: dispatchable.length,
    failures,
  };
}

/**
 * Scan in-memory rule lines: partition them into `workerCount` chunks, scan
 * the non-empty ones concurrently and sum their match counts. A failing
 * chunk is logged and left out of the total; its siblings carry on.
 *
 * @throws ScanError with E_INVALID_CONFIG for an empty service name, before
 * any line is scanned
 */
export async function scanRuleLines(
  lines: readonly RuleLine[],
  options: ScanRuleLinesOptions
): Promise<ScanOutcome> {
  validateServiceName(options.serviceName);
  validateWorkerCount(options.workerCount);
  return await scanValidatedLines(lines, options);
}

/**
 * Run a full scan for a validated configuration: load the rule file, scan it
 * and release the sink and worker threads.
 */
export async function runScan(
  config: ScanConfig,
  deps: RunScanDeps
): Promise<ScanSummary> {
  const { logger, signal } = deps;
  validateServiceName(config.serviceName);
  validateWorkerCount(config.workerCount);

  logger.info(
    `Starting search for service '${config.serviceName}' in file '${config.inputPath}' with ${String(config.workerCount)} workers...`
  );

  return await withScanDiagnostics(
    {
      serviceName: config.serviceName,
      inputPath: config.inputPath,
      workerCount: config.workerCount,
    },
    async () => {
      assertNotAborted(signal);
      const lines = await loadRuleLines(config.inputPath);
      const sink = deps.sink ?? createRuleSink(config.output, logger);
      const executor =
        deps.executor ?? createDefaultExecutor(config.workerCount, logger);

      try {
        const outcome = await scanValidatedLines(lines, {
          serviceName: config.serviceName,
          workerCount: config.workerCount,
          sink,
          logger,
          executor,
          signal,
        });
        return {
          ...outcome,
          serviceName: config.serviceName,
          inputPath: config.inputPath,
          workerCount: config.workerCount,
          executor: executor.kind,
        };
      } finally {
        await executor.close();
        await sink.close();
      }
    }
  );
}
