import { expect, it } from 'vitest';

import {
  classifyError,
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
  isNodeError,
  NODE_ERROR_CODE_MAP,
  ScanError,
} from '../../lib/errors.js';
import { createAbortError } from '../../lib/fs-helpers/abort.js';

it('ScanError carries code, path, details and cause', () => {
  const cause = new Error('Original error');
  const error = new ScanError(
    ErrorCode.E_NOT_FOUND,
    'File not found',
    '/rules/local.rules',
    { attempt: 1 },
    cause
  );
  expect(error.code).toBe(ErrorCode.E_NOT_FOUND);
  expect(error.path).toBe('/rules/local.rules');
  expect(error.details).toEqual({ attempt: 1 });
  expect(error.cause).toBe(cause);
  expect(error.name).toBe('ScanError');
  expect(error).toBeInstanceOf(Error);
});

it('ScanError.fromError appends the original stack', () => {
  const original = new Error('Original');
  original.stack = 'Original stack trace';
  const error = ScanError.fromError(ErrorCode.E_IO, 'Wrapped', original, '/p');
  expect(error.cause).toBe(original);
  expect(error.stack).toContain('Caused by: Original stack trace');
});

it('isNodeError only accepts errors with a string code', () => {
  expect(isNodeError(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe(
    true
  );
  expect(isNodeError(Object.assign(new Error('x'), { code: 123 }))).toBe(false);
  expect(isNodeError(new Error('x'))).toBe(false);
  expect(isNodeError({ code: 'ENOENT' })).toBe(false);
  expect(isNodeError(null)).toBe(false);
});

it('NODE_ERROR_CODE_MAP maps common Node.js error codes', () => {
  expect(NODE_ERROR_CODE_MAP.ENOENT).toBe(ErrorCode.E_NOT_FOUND);
  expect(NODE_ERROR_CODE_MAP.EACCES).toBe(ErrorCode.E_PERMISSION_DENIED);
  expect(NODE_ERROR_CODE_MAP.EISDIR).toBe(ErrorCode.E_NOT_FILE);
  expect(NODE_ERROR_CODE_MAP.ENOSPC).toBe(ErrorCode.E_IO);
});

it('classifyError prefers explicit codes, then Node codes, then messages', () => {
  expect(
    classifyError(new ScanError(ErrorCode.E_INVALID_CONFIG, 'bad'))
  ).toBe(ErrorCode.E_INVALID_CONFIG);
  expect(classifyError(createAbortError())).toBe(ErrorCode.E_ABORTED);
  expect(
    classifyError(Object.assign(new Error('denied'), { code: 'EPERM' }))
  ).toBe(ErrorCode.E_PERMISSION_DENIED);
  expect(classifyError(new Error('ENOENT: no such file'))).toBe(
    ErrorCode.E_NOT_FOUND
  );
  expect(classifyError('EACCES while opening')).toBe(
    ErrorCode.E_PERMISSION_DENIED
  );
  expect(classifyError({ message: 'not found' })).toBe(ErrorCode.E_UNKNOWN);
});

it('createDetailedError takes the path from a ScanError', () => {
  const detailed = createDetailedError(
    new ScanError(ErrorCode.E_NOT_FOUND, 'File not found', '/rules/a.rules'),
    '/fallback'
  );
  expect(detailed).toEqual({
    code: ErrorCode.E_NOT_FOUND,
    message: 'File not found',
    path: '/rules/a.rules',
    suggestion: getSuggestion(ErrorCode.E_NOT_FOUND),
  });
});

it('createDetailedError merges details', () => {
  const detailed = createDetailedError(
    new ScanError(ErrorCode.E_IO, 'oops', undefined, { a: 1 }),
    undefined,
    { b: 2 }
  );
  expect(detailed.details).toEqual({ a: 1, b: 2 });
});

it('formatDetailedError prints code, path and suggestion lines', () => {
  expect(
    formatDetailedError({
      code: ErrorCode.E_NOT_FOUND,
      message: 'File not found',
      path: '/rules/a.rules',
      suggestion: 'Check the path',
    })
  ).toBe(
    'Error [E_NOT_FOUND]: File not found\nPath: /rules/a.rules\nSuggestion: Check the path'
  );
  expect(
    formatDetailedError({ code: ErrorCode.E_UNKNOWN, message: 'Unknown' })
  ).toBe('Error [E_UNKNOWN]: Unknown');
});
