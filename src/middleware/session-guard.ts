import { FastifyRequest, FastifyReply } from 'fastify';
import type { SessionRegistry } from '../session/session-registry';
import type { ReviewSession } from '../session/review-session';
import { SessionNotFoundError } from '../errors';

export interface SessionParams {
  sessionId: string;
}

export function requireSession(
  registry: SessionRegistry,
  request: FastifyRequest<{ Params: SessionParams }>,
  reply: FastifyReply
): ReviewSession | null {
  try {
    return registry.get(request.params.sessionId);
  } catch (error) {
    if (error instanceof SessionNotFoundError) {
      reply.code(404).send({ error: error.message });
      return null;
    }
    throw error;
  }
}
