export enum ErrorCode {
  E_INVALID_CONFIG = 'E_INVALID_CONFIG',
  E_NOT_FOUND = 'E_NOT_FOUND',
  E_PERMISSION_DENIED = 'E_PERMISSION_DENIED',
  E_NOT_FILE = 'E_NOT_FILE',
  E_IO = 'E_IO',
  E_ABORTED = 'E_ABORTED',
  E_WORKER = 'E_WORKER',
  E_UNKNOWN = 'E_UNKNOWN',
}

export interface DetailedError {
  code: ErrorCode;
  message: string;
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_NOT_FOUND,
  EACCES: ErrorCode.E_PERMISSION_DENIED,
  EPERM: ErrorCode.E_PERMISSION_DENIED,
  EISDIR: ErrorCode.E_NOT_FILE,
  ENOTDIR: ErrorCode.E_NOT_FOUND,
  EMFILE: ErrorCode.E_IO,
  ENFILE: ErrorCode.E_IO,
  ENOSPC: ErrorCode.E_IO,
  EIO: ErrorCode.E_IO,
};

const SUGGESTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.E_INVALID_CONFIG]:
    'Provide a non-empty service name and a positive worker count.',
  [ErrorCode.E_NOT_FOUND]:
    'Check that the rule file exists and the path is spelled correctly.',
  [ErrorCode.E_PERMISSION_DENIED]:
    'Check the file permissions for the current user.',
  [ErrorCode.E_NOT_FILE]: 'The path points to a directory, not a rule file.',
  [ErrorCode.E_IO]: 'Retry the operation; check disk space and file handles.',
  [ErrorCode.E_ABORTED]: 'The scan was cancelled before it completed.',
  [ErrorCode.E_WORKER]:
    'A worker thread failed; rerun with RULE_SCAN_WORKER_THREADS=0.',
  [ErrorCode.E_UNKNOWN]: 'Check the log output for details.',
};

export class ScanError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    path?: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScanError';
    this.code = code;
    this.path = path;
    this.details = details;
  }

  static fromError(
    code: ErrorCode,
    message: string,
    original: unknown,
    path?: string
  ): ScanError {
    const error = new ScanError(code, message, path, undefined, original);
    if (original instanceof Error && original.stack) {
      error.stack = `${error.stack ?? ''}\nCaused by: ${original.stack}`;
    }
    return error;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

function classifyMessage(message: string): ErrorCode {
  const lower = message.toLowerCase();
  if (lower.includes('enoent') || lower.includes('not found')) {
    return ErrorCode.E_NOT_FOUND;
  }
  if (lower.includes('eacces') || lower.includes('eperm')) {
    return ErrorCode.E_PERMISSION_DENIED;
  }
  return ErrorCode.E_UNKNOWN;
}

export function classifyError(error: unknown): ErrorCode {
  if (error instanceof ScanError) return error.code;
  if (error instanceof Error && error.name === 'AbortError') {
    return ErrorCode.E_ABORTED;
  }
  if (isNodeError(error) && error.code) {
    const mapped = NODE_ERROR_CODE_MAP[error.code];
    if (mapped) return mapped;
  }
  if (error instanceof Error) return classifyMessage(error.message);
  if (typeof error === 'string') return classifyMessage(error);
  return ErrorCode.E_UNKNOWN;
}

export function getSuggestion(code: ErrorCode): string {
  return SUGGESTIONS[code];
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createDetailedError(
  error: unknown,
  path?: string,
  details?: Record<string, unknown>
): DetailedError {
  const code = classifyError(error);
  const resolvedPath = error instanceof ScanError ? (error.path ?? path) : path;
  const detailed: DetailedError = {
    code,
    message: toErrorMessage(error),
    path: resolvedPath,
    suggestion: getSuggestion(code),
  };
  const mergedDetails =
    error instanceof ScanError && error.details
      ? { ...error.details, ...details }
      : details;
  if (mergedDetails) detailed.details = mergedDetails;
  return detailed;
}

export function formatDetailedError(error: DetailedError): string {
  const lines = [`Error [${error.code}]: ${error.message}`];
  if (error.path) lines.push(`Path: ${error.path}`);
  if (error.suggestion) lines.push(`Suggestion: ${error.suggestion}`);
  return lines.join('\n');
}
