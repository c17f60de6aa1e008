/**
 * Media Plugin
 * 
 * Shares the operations engine and upload limits with every route.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { MediaOperations } from '@mediakit/processing';
import type { UploadLimits } from '../config/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    media: MediaOperations;
    uploadLimits: UploadLimits;
  }
}

export interface MediaPluginOptions {
  operations: MediaOperations;
  limits: UploadLimits;
}

const mediaPlugin: FastifyPluginAsync<MediaPluginOptions> = async (fastify, options) => {
  fastify.decorate('media', options.operations);
  fastify.decorate('uploadLimits', options.limits);
};

export const media = fp(mediaPlugin, {
  name: 'media',
});
