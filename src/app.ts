import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import { config as defaultConfig } from './config';
import type { AppConfig } from './config';
import { sessionRoutes } from './routes/sessions';
import { SessionRegistry } from './session/session-registry';
import { TabularStore } from './store/tabular-store';
import { geminiBackendFactory } from './ocr/gemini-extraction';
import type { BackendFactory } from './ocr/gemini-extraction';
import { validateGeminiApiKey } from './services/gemini/credentials';
import type { CredentialValidator } from './services/gemini/credentials';

export interface BuildAppOptions {
  config?: Partial<AppConfig>;
  /** Defaults to a store at `config.KYC_STORE_PATH`. */
  store?: TabularStore;
  registry?: SessionRegistry;
  /** Defaults to one Gemini backend per entry of `config.GEMINI_MODELS`. */
  backendFactory?: BackendFactory;
  validateCredential?: CredentialValidator;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...defaultConfig, ...options.config };
  const store = options.store ?? new TabularStore({ filePath: config.KYC_STORE_PATH });

  const server = Fastify({
    logger: process.env.NODE_ENV === 'test' ? false : true,
    bodyLimit: 1048576,
  });

  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      const json: unknown = body === '' ? {} : JSON.parse(String(body));
      done(null, json);
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition'],
  });

  await server.register(helmet, {
    crossOriginEmbedderPolicy: false,
  });

  await server.register(multipart, {
    limits: {
      fileSize: config.UPLOAD_MAX_BYTES,
      files: 1,
    },
  });

  await server.register(sessionRoutes, {
    registry: options.registry ?? new SessionRegistry({ idleTimeoutMs: config.SESSION_IDLE_MINUTES * 60 * 1000 }),
    store,
    backendFactory: options.backendFactory ?? geminiBackendFactory(config.GEMINI_MODELS),
    validateCredential: options.validateCredential ?? validateGeminiApiKey,
    earlyExitConfidence: config.EARLY_EXIT_CONFIDENCE,
    maxImageDimension: config.MAX_IMAGE_DIMENSION,
  });

  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return server;
}
