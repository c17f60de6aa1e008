/**
 * Health Routes
 * 
 * Liveness check with FFmpeg availability.
 */

import type { FastifyPluginAsync } from 'fastify';
import { config } from '../config/index.js';

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  ffmpegAvailable: boolean;
  ffmpegVersion?: string;
  version: string;
  responseTimeMs: number;
}

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/health', async (_request, reply) => {
    const start = performance.now();
    const tools = await fastify.media.toolStatus();

    const status: HealthStatus = {
      status: tools.ffmpegAvailable ? 'healthy' : 'unhealthy',
      ffmpegAvailable: tools.ffmpegAvailable,
      ffmpegVersion: tools.ffmpegVersion,
      version: config.version,
      responseTimeMs: Math.round((performance.now() - start) * 100) / 100,
    };

    return reply.send(status);
  });
};
