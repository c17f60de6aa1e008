/**
 * Multipart Form Reader
 * 
 * Buffers every part of a multipart request. Size and count limits are
 * enforced by @fastify/multipart while reading.
 */

import type { FastifyRequest } from 'fastify';
import type { Multipart } from '@fastify/multipart';
import { ValidationError } from '@mediakit/core';

export interface UploadedFile {
  fieldname: string;
  filename: string;
  data: Buffer;
}

export class MultipartForm {
  constructor(
    readonly files: readonly UploadedFile[],
    readonly fields: Readonly<Record<string, string>>
  ) {}

  /**
   * The single file sent under `name`
   */
  file(name: string): UploadedFile {
    const file = this.files.find(f => f.fieldname === name);
    if (!file) {
      throw new ValidationError(name, 'file is required');
    }
    return file;
  }

  /**
   * Every file sent under `name`, in upload order
   */
  filesNamed(name: string): UploadedFile[] {
    return this.files.filter(f => f.fieldname === name);
  }
}

export async function readMultipart(request: FastifyRequest): Promise<MultipartForm> {
  if (!request.isMultipart()) {
    throw new ValidationError('body', 'expected multipart/form-data');
  }

  const files: UploadedFile[] = [];
  const fields: Record<string, string> = {};

  for await (const part of request.parts()) {
    await collect(part, files, fields);
  }

  return new MultipartForm(files, fields);
}

async function collect(part: Multipart, files: UploadedFile[], fields: Record<string, string>): Promise<void> {
  if (part.type === 'file') {
    files.push({
      fieldname: part.fieldname,
      filename: part.filename,
      data: await part.toBuffer(),
    });
    return;
  }
  fields[part.fieldname] = String(part.value);
}
