import * as path from 'path';
import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { requireSession } from '../middleware/session-guard';
import type { SessionParams } from '../middleware/session-guard';
import type { SessionRegistry } from '../session/session-registry';
import {
  applyEdits,
  exportFileName,
  requireWorking,
  startReview,
  summarize,
  toFormSections,
  toJsonExport,
  toTableView,
} from '../session/review-session';
import type { ReviewSession } from '../session/review-session';
import type { TabularStore } from '../store/tabular-store';
import { XLSX_MIME_TYPE } from '../store/tabular-store';
import { fieldNames } from '../kyc/record-schema';
import { extractBestRecord } from '../ocr/extraction-orchestrator';
import type { BackendFactory } from '../ocr/gemini-extraction';
import { resizeForExtraction } from '../services/media/resize-image';
import type { CredentialValidator } from '../services/gemini/credentials';
import { ExtractionFailedError, UnsupportedImageError } from '../errors';
import { attachmentHeader, sendRouteError } from './utils';

export type SessionRouteOptions = {
  registry: SessionRegistry;
  store: TabularStore;
  backendFactory: BackendFactory;
  validateCredential: CredentialValidator;
  earlyExitConfidence: number;
  maxImageDimension: number;
};

const createSessionSchema = z.object({
  apiKey: z.string().trim().min(1, 'API key is required'),
});

const editsSchema = z.record(z.string(), z.string().nullable());

const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png']);
const IMAGE_MIME_TYPES = new Set(['image/jpeg', 'image/png']);

function assertImageUpload(fileName: string, mimeType: string): void {
  const extension = fileName.includes('.') ? fileName.split('.').pop()?.toLowerCase() : undefined;
  if (IMAGE_MIME_TYPES.has(mimeType) || (extension && IMAGE_EXTENSIONS.has(extension))) {
    return;
  }
  throw new UnsupportedImageError(`Upload a jpg, jpeg or png image (got ${mimeType || 'unknown type'})`);
}

function describeSession(session: ReviewSession) {
  const working = session.working;
  return {
    sessionId: session.id,
    createdAt: session.createdAt.toISOString(),
    sourceFileName: session.sourceFileName,
    summary: summarize(session),
    record: working,
    sections: working ? toFormSections(working) : [],
    table: working ? toTableView(working) : [],
    attempts: session.attempts,
    errors: session.errors,
  };
}

export async function sessionRoutes(fastify: FastifyInstance, options: SessionRouteOptions) {
  const { registry, store, backendFactory, validateCredential } = options;

  fastify.post('/api/sessions', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = createSessionSchema.parse(request.body);
      await validateCredential(body.apiKey);
      const session = registry.open(body.apiKey);
      return reply.code(201).send({ sessionId: session.id });
    } catch (error) {
      return sendRouteError(fastify, reply, error);
    }
  });

  fastify.get(
    '/api/sessions/:sessionId',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;
      return reply.send(describeSession(session));
    }
  );

  fastify.delete(
    '/api/sessions/:sessionId',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;
      registry.close(session.id);
      return reply.code(204).send();
    }
  );

  fastify.post(
    '/api/sessions/:sessionId/extract',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const data = await request.file();
        if (!data) {
          return reply.code(400).send({ error: 'No file uploaded' });
        }
        const buffer = await data.toBuffer();
        assertImageUpload(data.filename, data.mimetype);

        const image = await resizeForExtraction(buffer, options.maxImageDimension);
        request.log.info(
          { sessionId: session.id, width: image.width, height: image.height },
          'Extracting KYC fields'
        );
        const result = await extractBestRecord(image, backendFactory(session.apiKey), {
          earlyExitThreshold: options.earlyExitConfidence,
        });
        startReview(session, result, data.filename || null);

        if (!result.record) {
          throw new ExtractionFailedError(result.errors);
        }
        return reply.send({
          record: result.record,
          summary: summarize(session),
          attempts: result.attempts,
          errors: result.errors,
        });
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.patch(
    '/api/sessions/:sessionId/record',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const edits = editsSchema.parse(request.body);
        const working = applyEdits(session, edits);
        return reply.send({ record: working, sections: toFormSections(working), table: toTableView(working) });
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.post(
    '/api/sessions/:sessionId/save',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const saved = await store.append(requireWorking(session));
        const total = await store.count();
        return reply.code(201).send({ saved, total });
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.get(
    '/api/sessions/:sessionId/export.json',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const working = requireWorking(session);
        return reply
          .header('Content-Type', 'application/json; charset=utf-8')
          .header('Content-Disposition', attachmentHeader(exportFileName(session.sourceFileName, 'json')))
          .send(toJsonExport(working));
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.get(
    '/api/sessions/:sessionId/export.xlsx',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const bytes = await store.exportOne(requireWorking(session));
        return reply
          .header('Content-Type', XLSX_MIME_TYPE)
          .header('Content-Disposition', attachmentHeader(exportFileName(session.sourceFileName, 'xlsx')))
          .send(bytes);
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.get(
    '/api/sessions/:sessionId/database',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const rows = await store.openOrCreate();
        return reply.send({ total: rows.length, columns: fieldNames(), rows });
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );

  fastify.get(
    '/api/sessions/:sessionId/database/export.xlsx',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      const session = requireSession(registry, request, reply);
      if (!session) return;

      try {
        const bytes = await store.exportAll();
        return reply
          .header('Content-Type', XLSX_MIME_TYPE)
          .header('Content-Disposition', attachmentHeader(path.basename(store.filePath)))
          .send(bytes);
      } catch (error) {
        return sendRouteError(fastify, reply, error);
      }
    }
  );
}
