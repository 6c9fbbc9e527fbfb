import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createSessionStore } from './session/session-store';
import { SessionStore } from './session/types';
import { createClassifier } from './classifier/classifier-factory';
import { IntentClassifier } from './classifier/types';
import { createCatalog } from './catalog/catalog-factory';
import { CatalogAdapter } from './catalog/types';
import { KnowledgeService } from './knowledge/knowledge-service';
import { KnowledgeAdapter } from './knowledge/types';
import { ConversationEngine } from './orchestrator/conversation-engine';
import { registerChatRoutes } from './channels/chat-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  engine: ConversationEngine;
  redis?: Redis;
}

/** Overrides for wiring; anything left out is built from env. */
export interface BuildOptions {
  useRedis?: boolean;
  store?: SessionStore;
  classifier?: IntentClassifier;
  catalog?: CatalogAdapter;
  knowledge?: KnowledgeAdapter;
}

async function connectRedis(): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: BuildOptions = {}): Promise<AppContext> {
  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const useRedis = options.useRedis ?? env.redis.enabled;
  const redis = useRedis && !options.store ? await connectRedis() : undefined;

  const store = options.store ?? createSessionStore(redis);
  const classifier = options.classifier ?? createClassifier({
    provider: env.classifier.provider,
    openaiApiKey: env.classifier.openaiApiKey,
    model: env.classifier.model,
    temperature: env.classifier.temperature,
    timeoutMs: env.classifier.timeoutMs,
  });
  const catalog = options.catalog ?? createCatalog(env.catalog, env.knowledge.dir);
  const knowledge = options.knowledge ?? KnowledgeService.fromDirectory(env.knowledge.dir);

  const engine = new ConversationEngine(store, classifier, catalog, knowledge);

  registerChatRoutes(app, engine);
  registerHealthRoutes(app, redis);

  logger.info(
    { classifier: classifier.name, catalog: catalog.name, redis: Boolean(redis) },
    'Store assistant wired',
  );

  return { app, engine, redis };
}
