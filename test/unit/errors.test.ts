/**
 * Tests for the error taxonomy (src/utils/errors.ts).
 */

import { describe, expect, it } from 'vitest';
import {
  AppError,
  ERROR_STATUS,
  EngineFaultError,
  EngineLaunchError,
  NavigationTimeoutError,
  OperationCancelledError,
  PortInUseError,
  StaleReferenceError,
  UnknownSessionError,
  describeError,
  isFatalToSession,
} from '../../src/utils/errors.js';

describe('AppError', () => {
  it('carries its kind and HTTP status', () => {
    const err = new UnknownSessionError('abc');
    expect(err).toBeInstanceOf(AppError);
    expect(err.name).toBe('UnknownSessionError');
    expect(err.kind).toBe('UnknownSession');
    expect(err.statusCode).toBe(404);
    expect(err.toDescriptor()).toEqual({ kind: 'UnknownSession', message: 'Unknown session: abc' });
  });

  it('maps kinds to statuses', () => {
    expect(new StaleReferenceError('s1e1', 2).statusCode).toBe(409);
    expect(new OperationCancelledError('r').statusCode).toBe(499);
    expect(new NavigationTimeoutError('https://x.test/', 10).statusCode).toBe(504);
    expect(new PortInUseError('127.0.0.1', 8931).message).toBe('Port 8931 on 127.0.0.1 is already in use');
    expect(ERROR_STATUS.SessionLimitReached).toBe(429);
    expect(ERROR_STATUS.ElementNotInteractable).toBe(422);
  });
});

describe('isFatalToSession', () => {
  it('is true only for engine faults and launch failures', () => {
    expect(isFatalToSession(new EngineFaultError('gone'))).toBe(true);
    expect(isFatalToSession(new EngineLaunchError('no binary'))).toBe(true);
    expect(isFatalToSession(new UnknownSessionError('x'))).toBe(false);
    expect(isFatalToSession(new Error('other'))).toBe(false);
  });
});

describe('describeError', () => {
  it('keeps app errors and wraps everything else as InternalError', () => {
    expect(describeError(new EngineFaultError('gone'))).toEqual({
      kind: 'EngineFault',
      message: 'Browser engine fault: gone',
    });
    expect(describeError(new TypeError('bad'))).toEqual({ kind: 'InternalError', message: 'bad' });
    expect(describeError('plain')).toEqual({ kind: 'InternalError', message: 'plain' });
  });
});
