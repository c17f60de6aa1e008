/**
 * Error Handler Plugin
 * 
 * Global error handling for Fastify. Engine errors are rendered with a
 * title and a suggestion for the user.
 */

import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { MediaKitError } from '@mediakit/core';
import { describeError } from '../lib/errorCodes.js';

interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  suggestion?: string;
  details?: unknown;
}

const isProduction = (): boolean => process.env['NODE_ENV'] === 'production';

/** Limit errors raised by @fastify/multipart while reading a body */
const MULTIPART_LIMITS: Readonly<Record<string, { statusCode: number; code: string }>> = {
  FST_REQ_FILE_TOO_LARGE: { statusCode: 413, code: 'FILE_TOO_LARGE' },
  FST_FILES_LIMIT: { statusCode: 400, code: 'INVALID_FILE_COUNT' },
  FST_PARTS_LIMIT: { statusCode: 400, code: 'VALIDATION_ERROR' },
  FST_FIELDS_LIMIT: { statusCode: 400, code: 'VALIDATION_ERROR' },
  FST_INVALID_MULTIPART_CONTENT_TYPE: { statusCode: 400, code: 'VALIDATION_ERROR' },
};

function describe(statusCode: number, code: string, message: string, details?: unknown): ApiError {
  const { title, suggestion } = describeError(code);
  return { statusCode, error: title, message, code, suggestion, details };
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    // Zod validation errors
    if (error instanceof ZodError) {
      const apiError = describe(400, 'VALIDATION_ERROR', 'Request validation failed', error.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      })));
      
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(apiError);
    }

    // Engine errors
    if (error instanceof MediaKitError) {
      const serverSide = error.statusCode >= 500;
      const apiError = describe(
        error.statusCode,
        error.code,
        error.message,
        serverSide && isProduction() ? undefined : error.details
      );

      if (serverSide) {
        log.error({ err: error }, 'Media operation failed');
      } else {
        log.warn({ err: error }, 'Media request rejected');
      }
      return reply.status(error.statusCode).send(apiError);
    }

    // Multipart limits
    const limit = MULTIPART_LIMITS[error.code];
    if (limit) {
      log.warn({ err: error }, 'Upload rejected');
      return reply.status(limit.statusCode).send(describe(limit.statusCode, limit.code, error.message));
    }

    // Fastify validation errors
    if (error.validation) {
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(describe(400, 'VALIDATION_ERROR', 'Request validation failed', error.validation));
    }

    // Rate limit errors
    if (error.statusCode === 429) {
      return reply.status(429).send(describe(429, 'RATE_LIMIT', error.message));
    }

    // Known HTTP errors
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: error.name || 'Bad Request',
        message: error.message,
        code: error.code,
      };
      
      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(apiError);
    }

    // Internal server errors
    log.error({ err: error }, 'Internal server error');
    
    const apiError: ApiError = {
      statusCode: 500,
      error: 'Internal Server Error',
      message: isProduction()
        ? 'An unexpected error occurred' 
        : error.message,
    };

    return reply.status(500).send(apiError);
  });

  // Handle 404
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send(describe(404, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
