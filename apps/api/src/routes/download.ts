/**
 * Download Routes
 * 
 * Fetches remote audio as MP3.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { sendAttachment } from '../lib/reply.js';

const downloadQuerySchema = z.object({
  url: z.string().min(1),
});

export const downloadRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/download-audio', async (request, reply) => {
    const { url } = downloadQuerySchema.parse(request.query);

    const result = await fastify.media.downloadAudio(url);
    return sendAttachment(reply, { ...result, filename: `${result.title}.${result.format}` });
  });
};
