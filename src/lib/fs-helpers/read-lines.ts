import * as fs from 'node:fs/promises';

import type { RuleLine } from '../../config/types.js';
import { ErrorCode, isNodeError, ScanError } from '../errors.js';

/**
 * Split text into lines, each keeping its `\n` (or `\r\n`) terminator.
 * The last line has no terminator when the text does not end with one.
 */
export function splitLines(content: string): RuleLine[] {
  if (content.length === 0) return [];
  return content.split(/(?<=\n)/u);
}

export function stripLineTerminator(line: RuleLine): string {
  return line.replace(/\r?\n$/u, '');
}

function toLoadError(error: unknown, inputPath: string): ScanError {
  if (isNodeError(error) && error.code === 'ENOENT') {
    return ScanError.fromError(
      ErrorCode.E_NOT_FOUND,
      `File not found: ${inputPath}. Perhaps misspelled?`,
      error,
      inputPath
    );
  }
  if (isNodeError(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
    return ScanError.fromError(
      ErrorCode.E_PERMISSION_DENIED,
      `Permission denied when reading ${inputPath}`,
      error,
      inputPath
    );
  }
  if (isNodeError(error) && error.code === 'EISDIR') {
    return ScanError.fromError(
      ErrorCode.E_NOT_FILE,
      `Not a file: ${inputPath}`,
      error,
      inputPath
    );
  }
  return ScanError.fromError(
    ErrorCode.E_IO,
    `I/O error occurred when reading ${inputPath}`,
    error,
    inputPath
  );
}

function decodeRuleFile(buffer: Buffer, inputPath: string): string {
  // fatal: malformed bytes fail the load instead of becoming U+FFFD
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(buffer);
  } catch (error: unknown) {
    throw ScanError.fromError(
      ErrorCode.E_IO,
      `I/O error occurred when reading ${inputPath}: not valid UTF-8`,
      error,
      inputPath
    );
  }
}

/**
 * Read the whole rule file into memory as terminated lines. Bytes are kept
 * as they are, byte order mark included.
 *
 * @throws ScanError with E_IO when the file is not valid UTF-8
 */
export async function loadRuleLines(inputPath: string): Promise<RuleLine[]> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(inputPath);
  } catch (error: unknown) {
    throw toLoadError(error, inputPath);
  }
  return splitLines(decodeRuleFile(buffer, inputPath));
}
