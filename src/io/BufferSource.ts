import type { ByteSource } from '../types';

/**
 * Serves positional reads from bytes already in memory.
 */
export class BufferSource implements ByteSource {
  private readonly buffer: Uint8Array;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public read(length: number, position: number): Uint8Array {
    if (position >= this.buffer.length || length <= 0) return new Uint8Array(0);
    return this.buffer.subarray(position, Math.min(position + length, this.buffer.length));
  }
}
