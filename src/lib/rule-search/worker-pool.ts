/**
 * Worker thread pool for parallel chunk scanning.
 *
 * Slots are picked round-robin and spawn their worker lazily. A worker that
 * crashes is replaced on the next request, up to MAX_WORKER_RESPAWNS times
 * per slot.
 */
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import type { Chunk } from '../../config/types.js';
import { MAX_WORKER_RESPAWNS } from '../constants.js';
import type { Logger } from '../logger.js';
import {
  attachWorkerHandlers,
  createSlots,
  rejectPending,
  selectSlot,
} from './worker-pool-helpers.js';
import type {
  ChunkScanPool,
  ChunkScanRequest,
  ChunkScanResult,
  WorkerSlot,
} from './worker-pool-types.js';

const isSourceContext = fileURLToPath(import.meta.url).endsWith('.ts');
const WORKER_SCRIPT_URL = new URL('./chunk-worker.js', import.meta.url);

export interface ChunkWorkerPoolOptions {
  size: number;
  logger: Logger;
}

export class ChunkWorkerPool implements ChunkScanPool {
  private readonly slots: WorkerSlot[];
  private readonly logger: Logger;
  private nextRequestId = 0;
  private nextSlotIndex = 0;
  private closed = false;

  constructor(options: ChunkWorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError('Pool size must be a positive integer');
    }
    this.slots = createSlots(options.size);
    this.logger = options.logger;
  }

  private log(message: string): void {
    this.logger.debug(`[ChunkWorkerPool] ${message}`);
  }

  private spawnWorker(slot: WorkerSlot): Worker {
    this.log(`Spawning worker for slot ${String(slot.index)}`);

    const worker = new Worker(WORKER_SCRIPT_URL);

    attachWorkerHandlers(
      worker,
      slot,
      () => this.closed,
      MAX_WORKER_RESPAWNS,
      (message) => {
        this.log(message);
      }
    );

    return worker;
  }

  private getWorker(slot: WorkerSlot): Worker {
    slot.worker ??= this.spawnWorker(slot);
    return slot.worker;
  }

  /**
   * Scan one chunk on a worker thread.
   */
  async scan(chunk: Chunk, serviceName: string): Promise<ChunkScanResult> {
    if (this.closed) {
      throw new Error('Worker pool is closed');
    }

    const selection = selectSlot(
      this.slots,
      this.nextSlotIndex,
      MAX_WORKER_RESPAWNS
    );
    this.nextSlotIndex = selection.nextSlotIndex;
    const { slot } = selection;
    if (!slot) {
      throw new Error('All worker slots are disabled');
    }

    const worker = this.getWorker(slot);
    const id = this.nextRequestId++;
    const request: ChunkScanRequest = {
      type: 'scan',
      id,
      lines: chunk,
      serviceName,
    };

    return await new Promise<ChunkScanResult>((resolve, reject) => {
      slot.pending.set(id, { resolve, reject });
      worker.postMessage(request);
    });
  }

  /**
   * Close the pool and terminate all workers.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.log('Closing worker pool');

    const terminations: Promise<number>[] = [];
    for (const slot of this.slots) {
      rejectPending(slot, new Error('Worker pool closed'));
      if (slot.worker) {
        slot.worker.postMessage({ type: 'shutdown' });
        terminations.push(slot.worker.terminate());
        slot.worker = null;
      }
    }

    await Promise.allSettled(terminations);
    this.log('Worker pool closed');
  }
}

/**
 * Worker threads need compiled JavaScript; from TypeScript sources chunks run
 * in-process instead.
 */
export function isWorkerPoolAvailable(): boolean {
  return !isSourceContext;
}
