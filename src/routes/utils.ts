import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppError, ExtractionFailedError, InvalidEditError } from '../errors';

function clientStatusCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) return null;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : null;
}

export function sendRouteError(fastify: FastifyInstance, reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof z.ZodError) {
    return reply.code(400).send({ error: 'Invalid request body', details: error.errors });
  }
  if (error instanceof ExtractionFailedError) {
    fastify.log.warn({ errors: error.errors }, error.message);
    return reply.code(error.statusCode).send({ error: error.message, details: error.errors });
  }
  if (error instanceof InvalidEditError) {
    return reply.code(error.statusCode).send({ error: error.message, details: error.fields });
  }
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      fastify.log.error(error);
    }
    return reply.code(error.statusCode).send({ error: error.message });
  }
  // multipart limits and other fastify client errors carry their own status
  const statusCode = clientStatusCode(error);
  if (statusCode !== null && error instanceof Error) {
    return reply.code(statusCode).send({ error: error.message });
  }
  fastify.log.error(error);
  return reply.code(500).send({ error: 'Internal server error' });
}

export function attachmentHeader(fileName: string): string {
  return `attachment; filename="${fileName.replace(/"/g, '')}"`;
}
