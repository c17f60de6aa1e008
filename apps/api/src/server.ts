/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import multipart from '@fastify/multipart';
import type { MediaOperations } from '@mediakit/processing';

import { config, type UploadLimits } from './config/index.js';
import { loggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { media } from './plugins/media.js';

// Routes
import { healthRoutes, audioRoutes, probeRoutes, downloadRoutes } from './routes/index.js';

/** Multipart text fields accepted per request */
const MAX_FORM_FIELDS = 20;

export interface ServerOptions {
  operations: MediaOperations;
  limits?: Partial<UploadLimits>;
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const limits: UploadLimits = { ...config.uploads, ...options.limits };

  const server = Fastify({
    logger: loggerOptions,
    trustProxy: config.trustProxy,
    requestTimeout: 10 * 60 * 1000,
  });

  // ============================================
  // Security plugins
  // ============================================
  
  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    // Downloads are fetched by browser clients on other origins
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    exposedHeaders: ['Content-Disposition', 'X-Compression-Bypassed'],
  });

  // ============================================
  // Rate limiting
  // ============================================
  
  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });

  // ============================================
  // Uploads
  // ============================================
  
  await server.register(multipart, {
    limits: {
      fileSize: limits.maxUploadBytes,
      files: limits.maxMergeFiles,
      fields: MAX_FORM_FIELDS,
    },
  });

  await server.register(media, { operations: options.operations, limits });

  // ============================================
  // Error handling
  // ============================================
  
  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================
  
  // Root route - API info
  server.get('/', async () => ({
    name: 'mediakit-api',
    version: config.version,
    status: 'running',
    health: '/api/health',
  }));
  
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(audioRoutes, { prefix: '/api' });
  await server.register(probeRoutes, { prefix: '/api' });
  await server.register(downloadRoutes, { prefix: '/api' });

  return server;
}
