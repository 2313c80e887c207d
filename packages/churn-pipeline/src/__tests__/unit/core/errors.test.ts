/**
 * Error type tests
 */

import { describe, it, expect } from 'vitest';
import {
  BusyError,
  CancelledError,
  ExecutionError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isBusyError,
  isCancelledError,
  isExecutionError,
  isNotFoundError,
  isValidationError,
  toHttpStatus,
} from '../../../core/errors.js';

describe('ValidationError', () => {
  const error = new ValidationError('Upload rejected', [
    { code: 'missing-column', column: 'customerID', message: 'Missing required column: customerID' },
    { code: 'empty-table', message: 'Table has no data rows' },
  ]);

  it('keeps instanceof and its stable code', () => {
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_FAILED');
  });

  it('lists missing columns', () => {
    expect(error.missingColumns).toEqual(['customerID']);
  });

  it('formats issues for logs', () => {
    expect(error.toLogString()).toBe(
      [
        'ValidationError: Upload rejected',
        '  - [missing-column] Missing required column: customerID',
        '  - [empty-table] Table has no data rows',
      ].join('\n')
    );
  });
});

describe('ExecutionError', () => {
  it('carries reason and detail', () => {
    const error = new ExecutionError('timeout', 'exceeded 100ms');
    expect(error.reason).toBe('timeout');
    expect(error.detail).toBe('exceeded 100ms');
    expect(error.message).toBe('Scoring process failed (timeout): exceeded 100ms');
    expect(error.code).toBe('EXECUTION_FAILED');
  });
});

describe('BusyError', () => {
  it('rounds the retry hint up to whole seconds, at least one', () => {
    expect(new BusyError(2500).retryAfterSeconds).toBe(3);
    expect(new BusyError(100).retryAfterSeconds).toBe(1);
    expect(new BusyError(4000).retryAfterSeconds).toBe(4);
  });
});

describe('CancelledError', () => {
  it('has a stable code and default message', () => {
    const error = new CancelledError();
    expect(error).toBeInstanceOf(CancelledError);
    expect(error.code).toBe('CANCELLED');
    expect(error.message).toBe('Prediction run was cancelled');
  });
});

describe('type guards and HTTP mapping', () => {
  const validation = new ValidationError('bad', []);
  const execution = new ExecutionError('crash', 'boom');
  const busy = new BusyError(1000);
  const notFound = new NotFoundError('none yet', 'NO_BATCH');
  const cancelled = new CancelledError();

  it('narrows each error type', () => {
    expect(isValidationError(validation)).toBe(true);
    expect(isExecutionError(execution)).toBe(true);
    expect(isBusyError(busy)).toBe(true);
    expect(isNotFoundError(notFound)).toBe(true);
    expect(isCancelledError(cancelled)).toBe(true);
    expect(isCancelledError(execution)).toBe(false);
    expect(isValidationError(execution)).toBe(false);
    expect(isBusyError(new Error('plain'))).toBe(false);
  });

  it('maps errors to HTTP status codes', () => {
    expect(toHttpStatus(validation)).toBe(400);
    expect(toHttpStatus(notFound)).toBe(404);
    expect(toHttpStatus(busy)).toBe(409);
    expect(toHttpStatus(execution)).toBe(502);
    expect(toHttpStatus(cancelled)).toBe(499);
    expect(toHttpStatus(new Error('other'))).toBe(500);
    expect(toHttpStatus('string thrown')).toBe(500);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
