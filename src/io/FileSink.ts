import { closeSync, openSync, writeSync } from 'node:fs';
import type { ByteSink } from '../types';

/**
 * Write access to a newly created (or truncated) file.
 * Appends advance a cursor; {@link FileSink.writeAt} patches earlier bytes without moving it.
 */
export class FileSink implements ByteSink {
  private fd: number | null;
  private position = 0;

  constructor(filename: string) {
    this.fd = openSync(filename, 'w');
  }

  public get isOpen(): boolean {
    return this.fd !== null;
  }

  public get bytesWritten(): number {
    return this.position;
  }

  public write(bytes: Uint8Array): number {
    const written = this.writeAt(bytes, this.position);
    this.position += written;
    return written;
  }

  public writeAt(bytes: Uint8Array, position: number): number {
    if (this.fd === null) throw new Error('File sink is closed.');
    let done = 0;
    while (done < bytes.length) {
      done += writeSync(this.fd, bytes, done, bytes.length - done, position + done);
    }
    return done;
  }

  public close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
