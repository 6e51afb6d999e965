import type { FastifyInstance, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { ResourceSource, TicketDispatcher } from '../dispatcher/index.js';
import { InvalidRequestError, UploadTooLargeError } from '../errors.js';
import { msg } from '../lib/error-messages.js';
import { callerOf } from '../middleware/auth.js';
import { ResourcePathSchema, SubmissionOptionsSchema } from '../schemas/job.js';
import type { SubmissionOptions } from '../schemas/job.js';
import type { StatusService } from '../status/index.js';
import { resourceUrl, statusUrl, toStatusView } from '../status/index.js';
import type { JobKind } from '../types/job.js';
import { sendArtifact } from './tickets.js';

export interface SubmitRouteDeps {
  dispatcher: TicketDispatcher;
  status: StatusService;
  maxUploadBytes: number;
  preHandler: preHandlerAsyncHookHandler[];
}

type SourceType = 'file' | 'path';

const PROFILE_KINDS = {
  netcdf: 'profile-netcdf',
  raster: 'profile-raster',
  vector: 'profile-vector',
} as const satisfies Record<string, JobKind>;

interface ParsedSubmission {
  params: Record<string, unknown>;
  source: ResourceSource;
  options: SubmissionOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// Repeated fields become lists.
function addField(fields: Map<string, unknown>, name: string, value: unknown): void {
  const existing = fields.get(name);
  if (existing === undefined) {
    fields.set(name, value);
  } else if (Array.isArray(existing)) {
    fields.set(name, [...existing, value]);
  } else {
    fields.set(name, [existing, value]);
  }
}

async function readMultipart(request: FastifyRequest, maxUploadBytes: number) {
  const fields = new Map<string, unknown>();
  let upload: { fileName: string; content: Buffer } | undefined;

  try {
    for await (const part of request.parts()) {
      if (part.type === 'file') {
        const content = await part.toBuffer();
        if (part.fieldname === 'resource' && !upload) {
          upload = { fileName: part.filename, content };
        }
      } else {
        addField(fields, part.fieldname, part.value);
      }
    }
  } catch (error) {
    if (hasCode(error, 'FST_REQ_FILE_TOO_LARGE')) {
      throw new UploadTooLargeError(maxUploadBytes);
    }
    throw error;
  }

  return { fields, upload };
}

function readOptions(fields: Map<string, unknown>): SubmissionOptions {
  const parsed = SubmissionOptionsSchema.safeParse({
    response: fields.get('response'),
    inline: fields.get('inline'),
  });
  if (!parsed.success) {
    throw InvalidRequestError.fromZod(parsed.error);
  }
  return parsed.data;
}

function readParams(fields: Map<string, unknown>): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const [name, value] of fields) {
    if (name === 'resource' || name === 'response' || name === 'inline') continue;
    params[name] = value;
  }
  return params;
}

async function readSubmission(request: FastifyRequest, sourceType: SourceType, maxUploadBytes: number): Promise<ParsedSubmission> {
  let fields = new Map<string, unknown>();
  let source: ResourceSource | undefined;

  if (request.isMultipart()) {
    const multipart = await readMultipart(request, maxUploadBytes);
    fields = multipart.fields;
    if (sourceType === 'file' && multipart.upload) {
      source = { type: 'content', ...multipart.upload };
    }
  } else if (sourceType === 'path' && isRecord(request.body)) {
    for (const [name, value] of Object.entries(request.body)) {
      fields.set(name, value);
    }
  }

  if (sourceType === 'path') {
    const resource = fields.get('resource');
    if (resource !== undefined) {
      const path = ResourcePathSchema.safeParse(resource);
      if (!path.success) {
        throw InvalidRequestError.fromZod(path.error);
      }
      source = { type: 'path', path: path.data };
    }
  }

  if (!source) {
    throw new InvalidRequestError(msg('RESOURCE_REQUIRED'), {
      hint: sourceType === 'file'
        ? 'Send multipart/form-data with the file in the "resource" field'
        : 'Send "resource" with a path relative to the input directory',
    });
  }

  return { params: readParams(fields), source, options: readOptions(fields) };
}

export function registerSubmitRoutes(app: FastifyInstance, deps: SubmitRouteDeps): void {
  const { dispatcher, status, maxUploadBytes, preHandler } = deps;

  function submitHandler(kind: JobKind, sourceType: SourceType) {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      const owner = callerOf(request);
      const { params, source, options } = await readSubmission(request, sourceType, maxUploadBytes);

      const job = await dispatcher.submit({ kind, params, source, mode: options.response, owner });
      reply.header('x-ticket', job.ticket);

      if (job.mode === 'deferred') {
        return reply.code(202).send({
          ticket: job.ticket,
          status: job.status,
          statusUrl: statusUrl(job.ticket),
          resourceUrl: resourceUrl(job.ticket),
        });
      }

      if (job.status === 'success' && options.inline) {
        return sendArtifact(reply, await status.getResource(job.ticket, owner));
      }

      const view = toStatusView(job);
      return reply.send({
        ticket: view.ticket,
        status: view.status,
        ...(view.error ? { error: view.error } : {}),
        ...(view.resourceUrl ? { resourceUrl: view.resourceUrl } : {}),
      });
    };
  }

  for (const sourceType of ['file', 'path'] as const) {
    for (const [format, kind] of Object.entries(PROFILE_KINDS)) {
      app.post(`/profile/${sourceType}/${format}`, { preHandler }, submitHandler(kind, sourceType));
    }
    app.post(`/normalize/${sourceType}`, { preHandler }, submitHandler('normalize', sourceType));
  }
}
