import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import type { ByteSource } from '../types';

/**
 * Read-only access to a file through positional, synchronous reads.
 * The descriptor stays open until {@link FileSource.close} is called.
 */
export class FileSource implements ByteSource {
  public readonly size: number;
  private fd: number | null;

  constructor(filename: string) {
    const fd = openSync(filename, 'r');
    try {
      this.size = fstatSync(fd).size;
    } catch (err) {
      closeSync(fd);
      throw err;
    }
    this.fd = fd;
  }

  public get isOpen(): boolean {
    return this.fd !== null;
  }

  public read(length: number, position: number): Uint8Array {
    if (this.fd === null) throw new Error('File source is closed.');
    const available = Math.max(0, Math.min(length, this.size - position));
    const out = new Uint8Array(available);
    let filled = 0;
    while (filled < available) {
      const n = readSync(this.fd, out, filled, available - filled, position + filled);
      if (n === 0) break;
      filled += n;
    }
    return filled === available ? out : out.subarray(0, filled);
  }

  public close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
