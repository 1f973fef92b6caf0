/**
 * Unit tests for the global error handler
 * Express objects are mocked
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { createErrorHandler, statusFor } from '../src/utils/errorHandler.js';
import { EncodingError, NotFoundError, ValidationError } from '../src/errors.js';

const mockRequest = () => ({
  path: '/api/sshd/restore',
  method: 'POST'
}) as unknown as Request;

const mockResponse = () => {
  const res: Partial<Response> = {};
  res.status = vi.fn().mockReturnValue(res);
  res.json = vi.fn().mockReturnValue(res);
  return res as Response;
};

const mockNext: NextFunction = vi.fn();

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('statusFor', () => {
  it('should map NotFoundError to 404', () => {
    expect(statusFor(new NotFoundError('Backup not found', '/etc/ssh/sshd_config.bak'))).toBe(404);
  });

  it('should map ValidationError to 400', () => {
    expect(statusFor(new ValidationError('Host pattern must not be empty'))).toBe(400);
  });

  it('should map out-of-range indexes to 404', () => {
    expect(statusFor(new RangeError('Line index out of range: 9'))).toBe(404);
  });

  it('should keep client error statuses set by Express', () => {
    const parseError = Object.assign(new Error('Unexpected token'), { status: 400 });
    expect(statusFor(parseError)).toBe(400);
  });

  it('should map an undecodable config file to 500', () => {
    expect(statusFor(new EncodingError('Config file is not valid UTF-8: /tmp/x', '/tmp/x'))).toBe(500);
  });

  it('should map everything else to 500', () => {
    expect(statusFor(new Error('EACCES: permission denied'))).toBe(500);
    expect(statusFor(Object.assign(new Error('upstream'), { status: 503 }))).toBe(500);
  });
});

describe('createErrorHandler', () => {
  it('should answer 404 with the error message', () => {
    const handler = createErrorHandler({ production: false });
    const res = mockResponse();

    handler(new NotFoundError('Backup not found', '/tmp/x.bak'), mockRequest(), res, mockNext);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: 'Backup not found' });
    expect(console.warn).toHaveBeenCalled();
  });

  it('should include message and stack outside production', () => {
    const handler = createErrorHandler({ production: false });
    const res = mockResponse();
    const error = new Error('disk full');

    handler(error, mockRequest(), res, mockNext);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Internal server error',
      message: 'disk full',
      stack: error.stack
    });
    expect(console.error).toHaveBeenCalledWith('[Global Error Handler]', expect.objectContaining({
      message: 'disk full',
      path: '/api/sshd/restore',
      method: 'POST'
    }));
  });

  it('should hide details in production', () => {
    const handler = createErrorHandler({ production: true });
    const res = mockResponse();

    handler(new Error('disk full'), mockRequest(), res, mockNext);

    expect(res.json).toHaveBeenCalledWith({
      error: 'Internal server error',
      message: 'An unexpected error occurred'
    });
  });

  it('should not call next', () => {
    const next = vi.fn();
    createErrorHandler({ production: false })(new Error('x'), mockRequest(), mockResponse(), next);
    expect(next).not.toHaveBeenCalled();
  });
});
