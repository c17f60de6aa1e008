/**
 * Attachment Replies
 */

import type { FastifyReply } from 'fastify';
import { sanitizeFilename } from '@mediakit/utils';

export interface Attachment {
  data: Buffer;
  filename: string;
  mimeType: string;
}

export function sendAttachment(reply: FastifyReply, attachment: Attachment): FastifyReply {
  const filename = sanitizeFilename(attachment.filename);
  return reply
    .header('Content-Type', attachment.mimeType)
    .header('Content-Disposition', `attachment; filename="${filename}"`)
    .send(attachment.data);
}
