/** One line of the rule file, line terminator included. */
export type RuleLine = string;

/** Contiguous run of rule lines handed to exactly one worker. */
export type Chunk = readonly RuleLine[];

export type OutputTarget = { kind: 'console' } | { kind: 'file'; path: string };

export interface ScanConfig {
  inputPath: string;
  serviceName: string;
  workerCount: number;
  output: OutputTarget;
}

export interface ChunkFailure {
  chunkIndex: number;
  lineCount: number;
  message: string;
}

export interface ScanOutcome {
  totalMatches: number;
  linesScanned: number;
  chunksDispatched: number;
  failures: readonly ChunkFailure[];
}

export interface ScanSummary extends ScanOutcome {
  serviceName: string;
  inputPath: string;
  workerCount: number;
  executor: ExecutorKind;
}

export type ExecutorKind = 'inline' | 'threads';
