import { createReadStream } from 'node:fs';
import type { FastifyInstance, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import type { StoredArtifact } from '../artifacts/store.js';
import { callerOf } from '../middleware/auth.js';
import { JobListQuerySchema, TicketParamsSchema } from '../schemas/job.js';
import type { StatusService } from '../status/index.js';

export interface TicketRouteDeps {
  status: StatusService;
  authenticate: preHandlerAsyncHookHandler;
}

export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  if (fallback === fileName) {
    return `attachment; filename="${fileName}"`;
  }
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

export function sendArtifact(reply: FastifyReply, artifact: StoredArtifact) {
  return reply
    .header('content-type', artifact.mediaType)
    .header('content-length', artifact.size)
    .header('content-disposition', contentDisposition(artifact.fileName))
    .send(createReadStream(artifact.path));
}

export function registerTicketRoutes(app: FastifyInstance, deps: TicketRouteDeps): void {
  const { status, authenticate } = deps;

  // GET /status/:ticket - Current state of a job
  app.get('/status/:ticket', { preHandler: authenticate }, async (request) => {
    const { ticket } = TicketParamsSchema.parse(request.params);
    return status.getStatus(ticket, callerOf(request));
  });

  // GET /resource/:ticket - Artifact of a successful job
  app.get('/resource/:ticket', { preHandler: authenticate }, async (request, reply) => {
    const { ticket } = TicketParamsSchema.parse(request.params);
    const artifact = await status.getResource(ticket, callerOf(request));
    return sendArtifact(reply, artifact);
  });

  // GET /jobs - The caller's jobs, newest first
  app.get('/jobs', { preHandler: authenticate }, async (request) => {
    const query = JobListQuerySchema.parse(request.query);
    return status.listJobs(callerOf(request), query);
  });
}
