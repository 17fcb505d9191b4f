import { channel } from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import { parseEnvFlag } from '../constants.js';
import { toErrorMessage } from '../errors.js';

export const SCAN_CHANNEL_NAME = 'rule-msg-finder:scan';

export interface ScanDiagnosticsEvent {
  phase: 'start' | 'end';
  serviceName: string;
  inputPath: string;
  workerCount: number;
  durationMs?: number;
  ok?: boolean;
  error?: string;
  totalMatches?: number;
  eventLoopUtilization?: number;
}

type ScanIdentity = Pick<
  ScanDiagnosticsEvent,
  'serviceName' | 'inputPath' | 'workerCount'
>;

const SCAN_CHANNEL = channel(SCAN_CHANNEL_NAME);

function isDiagnosticsEnabled(): boolean {
  return parseEnvFlag('RULE_SCAN_DIAGNOSTICS', false);
}

function resolveDurationMs(startNs: bigint): number {
  const endNs = process.hrtime.bigint();
  return Number(endNs - startNs) / 1_000_000;
}

/**
 * Publish start/end events for a scan on the diagnostics channel. A no-op
 * unless RULE_SCAN_DIAGNOSTICS is on and someone subscribed.
 */
export async function withScanDiagnostics<T extends { totalMatches: number }>(
  identity: ScanIdentity,
  run: () => Promise<T>
): Promise<T> {
  if (!isDiagnosticsEnabled() || !SCAN_CHANNEL.hasSubscribers) {
    return await run();
  }

  const startNs = process.hrtime.bigint();
  const startElu = performance.eventLoopUtilization();
  SCAN_CHANNEL.publish({
    phase: 'start',
    ...identity,
  } satisfies ScanDiagnosticsEvent);

  const publishEnd = (
    details: Pick<ScanDiagnosticsEvent, 'ok' | 'error' | 'totalMatches'>
  ): void => {
    SCAN_CHANNEL.publish({
      phase: 'end',
      ...identity,
      ...details,
      durationMs: resolveDurationMs(startNs),
      eventLoopUtilization:
        performance.eventLoopUtilization(startElu).utilization,
    } satisfies ScanDiagnosticsEvent);
  };

  try {
    const result = await run();
    publishEnd({ ok: true, totalMatches: result.totalMatches });
    return result;
  } catch (error: unknown) {
    publishEnd({ ok: false, error: toErrorMessage(error) });
    throw error;
  }
}
