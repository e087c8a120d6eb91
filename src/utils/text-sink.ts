import * as fs from 'node:fs';
import { TextSink } from '../bridge/types';

/**
 * Synchronous file output. Chunks go straight to the descriptor, so once
 * close() returns everything is on disk.
 */
export class FileSink implements TextSink {
  private fd: number | null;

  constructor(public readonly filePath: string) {
    this.fd = fs.openSync(filePath, 'w');
  }

  write(chunk: string): void {
    if (this.fd === null) {
      throw new Error(`Sink for ${this.filePath} is already closed`);
    }
    fs.writeSync(this.fd, chunk, null, 'utf8');
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.fsyncSync(fd);
    fs.closeSync(fd);
  }
}

/**
 * In-memory output
 */
export class BufferSink implements TextSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
