import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ByteSink } from '../../src/types';

export interface TestChunk {
  id: string;
  size: number;
  data?: Uint8Array;
}

/**
 * Assembles a RIFF/WAVE byte stream from raw chunks. Each chunk's data is written
 * as given, so callers add pad bytes themselves.
 */
export function createTestBuffer(opts: {
  riffSize?: number;
  form?: string;
  chunks: TestChunk[];
  corrupt?: { at: number; val: number }[];
}): Uint8Array {
  let finalBufferSize = 12;
  for (const chunk of opts.chunks) {
    finalBufferSize += 8 + (chunk.data ? chunk.data.length : 0);
  }
  const buffer = new Uint8Array(finalBufferSize);
  const view = new DataView(buffer.buffer);

  writeId(buffer, 0, 'RIFF');
  view.setUint32(4, opts.riffSize ?? finalBufferSize - 8, true);
  writeId(buffer, 8, opts.form ?? 'WAVE');

  let currentOffset = 12;
  for (const chunk of opts.chunks) {
    writeId(buffer, currentOffset, chunk.id);
    view.setUint32(currentOffset + 4, chunk.size, true);
    currentOffset += 8;
    if (chunk.data) {
      buffer.set(chunk.data, currentOffset);
      currentOffset += chunk.data.length;
    }
  }
  if (opts.corrupt) for (const { at, val } of opts.corrupt) if (at < buffer.length) buffer[at] = val;
  return buffer;
}

function writeId(buffer: Uint8Array, offset: number, id: string): void {
  for (let i = 0; i < 4; i++) buffer[offset + i] = id.charCodeAt(i);
}

/**
 * A 16-byte `fmt ` body. `blockAlign` defaults to the value implied by the other fields.
 */
export function fmtBody(fields: {
  format?: number;
  numChannels?: number;
  sampleRate?: number;
  bitDepth?: number;
  blockAlign?: number;
}): Uint8Array {
  const { format = 1, numChannels = 1, sampleRate = 44100, bitDepth = 16 } = fields;
  const blockAlign = fields.blockAlign ?? numChannels * (bitDepth / 8);
  const body = new Uint8Array(16);
  const view = new DataView(body.buffer);
  view.setUint16(0, format, true);
  view.setUint16(2, numChannels, true);
  view.setUint32(4, sampleRate, true);
  view.setUint32(8, sampleRate * blockAlign, true);
  view.setUint16(12, blockAlign, true);
  view.setUint16(14, bitDepth, true);
  return body;
}

/**
 * An in-memory {@link ByteSink} that grows as bytes are appended.
 */
export class MemorySink implements ByteSink {
  public bytes = new Uint8Array(0);
  private position = 0;

  public write(bytes: Uint8Array): number {
    const written = this.writeAt(bytes, this.position);
    this.position += written;
    return written;
  }

  public writeAt(bytes: Uint8Array, position: number): number {
    const end = position + bytes.length;
    if (end > this.bytes.length) {
      const grown = new Uint8Array(end);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.bytes.set(bytes, position);
    return bytes.length;
  }
}

/**
 * Creates a fresh temporary directory and returns it with a cleanup function.
 */
export function createTempDir(): { dir: string; file: (name: string) => string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'wav-sample-io-'));
  return {
    dir,
    file: (name) => join(dir, name),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function sine(frames: number, frequency: number, sampleRate: number, amplitude = 0.5): Float32Array {
  const out = new Float32Array(frames);
  for (let i = 0; i < frames; i++) {
    out[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return out;
}

export function readUint32LE(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);
}
