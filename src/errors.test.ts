import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { InvalidRequestError, NotReadyError, ServiceError, UploadTooLargeError, toServiceError } from './errors.js';

describe('toServiceError', () => {
  it('should keep service errors', () => {
    const error = new NotReadyError('01J00000000000000000000000', 'running');

    expect(toServiceError(error)).toBe(error);
    expect(error.statusCode).toBe(409);
    expect(error.hint).toBe('Poll /status/01J00000000000000000000000 until the job succeeds');
  });

  it('should turn zod errors into invalid requests', () => {
    const parsed = z.object({ limit: z.number() }).safeParse({ limit: 'ten' });
    if (parsed.success) throw new Error('expected a validation failure');

    const error = toServiceError(parsed.error);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error.statusCode).toBe(400);
    expect(error.fields).toEqual({ issues: [{ path: 'limit', message: 'Expected number, received string' }] });
  });

  it('should keep the status of client errors raised by the framework', () => {
    const bodyTooLarge = Object.assign(new Error('Request body is too large'), { statusCode: 413 });

    const error = toServiceError(bodyTooLarge);

    expect(error.type).toBe('INVALID_REQUEST');
    expect(error.statusCode).toBe(413);
    expect(error.message).toBe('Request body is too large');
  });

  it('should hide unexpected errors behind a generic message', () => {
    const error = toServiceError(new Error('SQLITE_CORRUPT: database disk image is malformed'));

    expect(error.type).toBe('INTERNAL');
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('Something went wrong');
  });

  it('should report upload limits with status 413', () => {
    const error = new UploadTooLargeError(1024);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.statusCode).toBe(413);
    expect(error.message).toBe('Uploaded file exceeds the maximum size of 1024 bytes');
  });
});
