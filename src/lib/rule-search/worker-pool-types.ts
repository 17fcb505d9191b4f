import type { Worker } from 'node:worker_threads';

import type { Chunk, RuleLine } from '../../config/types.js';

export interface ChunkScanRequest {
  type: 'scan';
  id: number;
  lines: readonly RuleLine[];
  serviceName: string;
}

export interface ShutdownRequest {
  type: 'shutdown';
}

export type WorkerRequest = ChunkScanRequest | ShutdownRequest;

export interface ChunkScanResult {
  matchCount: number;
  matchedLines: RuleLine[];
}

export interface ChunkScanResponse {
  type: 'result';
  id: number;
  result: ChunkScanResult;
}

export interface ChunkScanErrorResponse {
  type: 'error';
  id: number;
  error: string;
}

export type WorkerResponse = ChunkScanResponse | ChunkScanErrorResponse;

export interface PendingTask {
  resolve: (result: ChunkScanResult) => void;
  reject: (error: Error) => void;
}

export interface WorkerSlot {
  worker: Worker | null;
  pending: Map<number, PendingTask>;
  respawnCount: number;
  index: number;
}

/** What the thread executor needs from a pool. */
export interface ChunkScanPool {
  scan: (chunk: Chunk, serviceName: string) => Promise<ChunkScanResult>;
  close: () => Promise<void>;
}
