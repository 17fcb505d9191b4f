import type { Worker } from 'node:worker_threads';

import type { WorkerResponse, WorkerSlot } from './worker-pool-types.js';

type LogFn = (message: string) => void;

export function createSlots(size: number): WorkerSlot[] {
  return Array.from({ length: size }, (_, index) => ({
    worker: null,
    pending: new Map(),
    respawnCount: 0,
    index,
  }));
}

export function rejectPending(slot: WorkerSlot, error: Error): void {
  for (const [, pending] of slot.pending) {
    pending.reject(error);
  }
  slot.pending.clear();
}

export function handleWorkerMessage(
  slot: WorkerSlot,
  message: WorkerResponse,
  log: LogFn
): void {
  const pending = slot.pending.get(message.id);
  if (!pending) {
    log(`Received message for unknown request ${String(message.id)}`);
    return;
  }

  slot.pending.delete(message.id);

  if (message.type === 'result') {
    pending.resolve(message.result);
  } else {
    pending.reject(new Error(message.error));
  }
}

export function handleWorkerError(
  slot: WorkerSlot,
  error: Error,
  log: LogFn
): void {
  log(`Worker ${String(slot.index)} error: ${error.message}`);

  rejectPending(slot, new Error(`Worker error: ${error.message}`));

  const { worker } = slot;
  slot.worker = null;
  worker?.terminate().catch((terminateError: unknown) => {
    log(
      `Worker ${String(slot.index)} failed to terminate: ${String(terminateError)}`
    );
  });
}

export function handleWorkerExit(
  slot: WorkerSlot,
  code: number,
  isClosed: boolean,
  maxRespawns: number,
  log: LogFn
): void {
  log(`Worker ${String(slot.index)} exited with code ${String(code)}`);

  if (isClosed) {
    return;
  }

  if (slot.pending.size > 0) {
    rejectPending(
      slot,
      new Error(`Worker exited unexpectedly with code ${String(code)}`)
    );
  }

  slot.worker = null;

  if (code !== 0 && slot.respawnCount < maxRespawns) {
    slot.respawnCount++;
    log(
      `Worker ${String(slot.index)} will be respawned on next request (attempt ${String(slot.respawnCount)}/${String(maxRespawns)})`
    );
  } else if (slot.respawnCount >= maxRespawns) {
    log(`Worker ${String(slot.index)} exceeded max respawns, slot disabled`);
  }
}

export function isSlotUsable(slot: WorkerSlot, maxRespawns: number): boolean {
  return slot.worker !== null || slot.respawnCount < maxRespawns;
}

export function selectSlot(
  slots: readonly WorkerSlot[],
  nextSlotIndex: number,
  maxRespawns: number
): { slot: WorkerSlot | null; nextSlotIndex: number } {
  let attempts = 0;
  let index = nextSlotIndex;

  while (attempts < slots.length) {
    const slot = slots[index];
    index = (index + 1) % slots.length;
    attempts++;

    if (slot && isSlotUsable(slot, maxRespawns)) {
      return { slot, nextSlotIndex: index };
    }
  }

  return { slot: null, nextSlotIndex: index };
}

export function attachWorkerHandlers(
  worker: Worker,
  slot: WorkerSlot,
  getClosed: () => boolean,
  maxRespawns: number,
  log: LogFn
): void {
  worker.on('message', (message: WorkerResponse) => {
    handleWorkerMessage(slot, message, log);
  });

  worker.on('error', (error: Error) => {
    handleWorkerError(slot, error, log);
  });

  worker.on('exit', (code: number) => {
    handleWorkerExit(slot, code, getClosed(), maxRespawns, log);
  });
}
