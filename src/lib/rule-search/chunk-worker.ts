/**
 * Worker thread entry for chunk scanning.
 *
 * Protocol:
 * - Receive: { type: 'scan', id, lines, serviceName }
 * - Send: { type: 'result', id, result } | { type: 'error', id, error }
 * - Receive: { type: 'shutdown' }
 */
import { parentPort } from 'node:worker_threads';

import { handleChunkScanRequest } from './chunk-worker-scan.js';
import type { WorkerRequest } from './worker-pool-types.js';

const port = parentPort;

if (!port) {
  throw new Error('Chunk worker must be run in a worker thread');
}

function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!value || typeof value !== 'object' || !('type' in value)) return false;
  if (value.type === 'shutdown') return true;
  return (
    value.type === 'scan' &&
    'id' in value &&
    typeof value.id === 'number' &&
    'lines' in value &&
    Array.isArray(value.lines) &&
    'serviceName' in value &&
    typeof value.serviceName === 'string'
  );
}

port.on('message', (message: unknown) => {
  if (!isWorkerRequest(message)) return;
  if (message.type === 'shutdown') {
    process.exit(0);
  }
  void handleChunkScanRequest(message).then((response) => {
    port.postMessage(response);
  });
});

