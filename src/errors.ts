import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { fmt, msg } from './lib/error-messages.js';
import type { JobError, JobStatus } from './types/job.js';

export type ErrorType =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'NOT_READY'
  | 'JOB_FAILED'
  | 'RATE_LIMIT'
  | 'ARTIFACT_MISSING'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export function errorResponse(type: ErrorType, message: string, hint?: string, fields?: Record<string, unknown>): ApiError {
  return { error: { type, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'INVALID_REQUEST': return 400;
    case 'UNAUTHORIZED': return 401;
    case 'NOT_FOUND': return 404;
    case 'NOT_READY': return 409;
    case 'JOB_FAILED': return 422;
    case 'RATE_LIMIT': return 429;
    case 'ARTIFACT_MISSING': return 507;
    case 'INTERNAL':
    default: return 500;
  }
}

export interface ServiceErrorOptions {
  fields?: Record<string, unknown>;
  hint?: string;
  statusCode?: number;
}

export class ServiceError extends Error {
  readonly fields?: Record<string, unknown>;
  readonly hint?: string;
  readonly statusCode: number;

  constructor(readonly type: ErrorType, message: string, options: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.fields = options.fields;
    this.hint = options.hint;
    this.statusCode = options.statusCode ?? errorTypeToStatus(type);
  }
}

export class InvalidRequestError extends ServiceError {
  constructor(message: string = msg('INVALID_REQUEST'), options: ServiceErrorOptions = {}) {
    super('INVALID_REQUEST', message, options);
    this.name = 'InvalidRequestError';
  }

  static fromZod(error: ZodError): InvalidRequestError {
    return new InvalidRequestError(msg('INVALID_REQUEST'), {
      fields: {
        issues: error.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      },
    });
  }
}

export class NotFoundError extends ServiceError {
  constructor(readonly ticket: string) {
    super('NOT_FOUND', msg('TICKET_NOT_FOUND'), { fields: { ticket } });
    this.name = 'NotFoundError';
  }
}

export class NotReadyError extends ServiceError {
  constructor(readonly ticket: string, readonly status: JobStatus) {
    super('NOT_READY', msg('TICKET_NOT_READY'), {
      fields: { ticket, status },
      hint: `Poll /status/${ticket} until the job succeeds`,
    });
    this.name = 'NotReadyError';
  }
}

export class JobFailedError extends ServiceError {
  constructor(readonly ticket: string, readonly jobError: JobError) {
    super('JOB_FAILED', msg('JOB_FAILED'), { fields: { ticket, error: jobError } });
    this.name = 'JobFailedError';
  }
}

export class ArtifactMissingError extends ServiceError {
  constructor(readonly ticket: string) {
    super('ARTIFACT_MISSING', msg('ARTIFACT_MISSING'), { fields: { ticket } });
    this.name = 'ArtifactMissingError';
  }
}

export class UploadTooLargeError extends InvalidRequestError {
  constructor(limit: number) {
    super(fmt('UPLOAD_TOO_LARGE', { limit }), { statusCode: 413 });
    this.name = 'UploadTooLargeError';
  }
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number') return statusCode;
  }
  return undefined;
}

/**
 * Maps anything thrown inside a request onto the public taxonomy. Fastify's
 * own client errors (malformed JSON, body limits) keep their status code.
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;
  if (error instanceof ZodError) return InvalidRequestError.fromZod(error);

  const statusCode = httpStatusOf(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    const message = error instanceof Error ? error.message : msg('INVALID_REQUEST');
    if (statusCode === 401) return new ServiceError('UNAUTHORIZED', message);
    if (statusCode === 429) return new ServiceError('RATE_LIMIT', message);
    return new InvalidRequestError(message, { statusCode });
  }

  return new ServiceError('INTERNAL', msg('INTERNAL_UNEXPECTED'));
}

export function replyWithAppError(reply: FastifyReply, error: ServiceError) {
  return reply.code(error.statusCode).send(
    errorResponse(error.type, error.message, error.hint, error.fields)
  );
}
