import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import type { ToolInvocation, ToolOutput } from '@mediakit/core';
import { ScriptedRunner, toolOutput } from '@mediakit/core/testing';
import { MediaOperations, ScratchSpaceManager } from '@mediakit/processing';
import type { UploadLimits } from '../config/index.js';
import { createServer } from '../server.js';

export type FormPart =
  | { name: string; value: string }
  | { name: string; filename: string; data: Buffer; contentType?: string };

const BOUNDARY = '----mediakitTestBoundary7MA4YWxk';

/**
 * multipart/form-data body and headers for `inject`
 */
export function multipartBody(parts: readonly FormPart[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    chunks.push(Buffer.from(`--${BOUNDARY}\r\n`));
    if ('filename' in part) {
      chunks.push(Buffer.from(
        `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n` +
        `Content-Type: ${part.contentType ?? 'application/octet-stream'}\r\n\r\n`
      ));
      chunks.push(part.data);
    } else {
      chunks.push(Buffer.from(`Content-Disposition: form-data; name="${part.name}"\r\n\r\n${part.value}`));
    }
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

/** Minimal bodies that pass signature sniffing */
export const samples = {
  wav: Buffer.concat([Buffer.from('RIFF'), Buffer.alloc(4), Buffer.from('WAVEfmt '), Buffer.alloc(16)]),
  mp3: Buffer.concat([Buffer.from('ID3'), Buffer.alloc(29)]),
  mp4: Buffer.concat([Buffer.from([0, 0, 0, 0x20]), Buffer.from('ftypisom'), Buffer.alloc(20)]),
};

/**
 * Answers every probe with plausible values and every ffmpeg run with a
 * label naming the operation
 */
export function defaultTools(invocation: ToolInvocation): ToolOutput {
  switch (invocation.operation) {
    case 'ffmpeg:version':
      return toolOutput('ffmpeg version 6.1.1 Copyright (c) 2000-2023 the FFmpeg developers\n');
    case 'ffprobe:sample-rate':
      return toolOutput('44100\n');
    case 'ffprobe:bitrate':
      return toolOutput('320000\n');
    case 'ffprobe:audio-track':
      return toolOutput('audio\n');
    case 'ffprobe:duration-container':
      return toolOutput('20.000000\n');
    default:
      return toolOutput(`out:${invocation.operation}`);
  }
}

export interface TestApp {
  server: FastifyInstance;
  runner: ScriptedRunner;
  scratchRoot: string;
  close(): Promise<void>;
}

export async function buildTestApp(
  handler: (invocation: ToolInvocation) => ToolOutput = defaultTools,
  limits?: Partial<UploadLimits>
): Promise<TestApp> {
  const scratchRoot = mkdtempSync(join(tmpdir(), 'api-test-'));
  const runner = new ScriptedRunner(handler);
  const operations = new MediaOperations({
    runner,
    scratch: new ScratchSpaceManager({ root: scratchRoot }),
  });
  const server = await createServer({ operations, limits });

  return {
    server,
    runner,
    scratchRoot,
    async close() {
      await server.close();
      rmSync(scratchRoot, { recursive: true, force: true });
    },
  };
}

/**
 * Entry names from a ZIP's central directory, in archive order
 */
export function zipEntryNames(zip: Buffer): string[] {
  const end = zip.length - 22;
  if (zip.readUInt32LE(end) !== 0x06054b50) {
    throw new Error('end of central directory not found');
  }

  const names: string[] = [];
  let offset = zip.readUInt32LE(end + 16);
  for (let i = 0; i < zip.readUInt16LE(end + 10); i++) {
    const nameLength = zip.readUInt16LE(offset + 28);
    const extraLength = zip.readUInt16LE(offset + 30);
    const commentLength = zip.readUInt16LE(offset + 32);
    names.push(zip.subarray(offset + 46, offset + 46 + nameLength).toString('utf8'));
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return names;
}
