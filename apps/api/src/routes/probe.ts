/**
 * Probe Routes
 * 
 * Reports what the engine can tell about an uploaded file.
 */

import type { FastifyPluginAsync } from 'fastify';
import { isVideoFormat } from '@mediakit/core';
import { getExtension } from '@mediakit/utils';
import { validateUpload } from '@mediakit/validation';
import { readMultipart } from '../lib/multipart.js';

export const probeRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post('/probe', async (request) => {
    const form = await readMultipart(request);
    const file = form.file('file');
    const upload = validateUpload({
      filename: file.filename,
      data: file.data,
      kind: isVideoFormat(getExtension(file.filename)) ? 'video' : 'audio',
      maxBytes: fastify.uploadLimits.maxUploadBytes,
    });

    const probe = await fastify.media.inspect(upload.data);
    return { filename: upload.filename, format: upload.format, ...probe };
  });
};
