import type { FastifyReply, FastifyRequest } from 'fastify';
import { ServiceError } from '../errors.js';
import { msg } from '../lib/error-messages.js';

const CLIENT_ID = /^[A-Za-z0-9_.:@-]{1,128}$/;

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest, _reply: FastifyReply) => {
    if (!expectedKey) {
      return; // No API key required if not configured
    }

    if (headerValue(request, 'x-api-key') !== expectedKey) {
      throw new ServiceError('UNAUTHORIZED', msg('UNAUTHORIZED'));
    }
  };
}

/** Client identity from `x-client-id`; null for anonymous callers. */
export function callerOf(request: FastifyRequest): string | null {
  const clientId = headerValue(request, 'x-client-id')?.trim();
  if (!clientId) return null;
  if (!CLIENT_ID.test(clientId)) {
    throw new ServiceError('INVALID_REQUEST', 'Malformed x-client-id header', {
      hint: 'Use up to 128 letters, digits and . _ : @ -',
    });
  }
  return clientId;
}
