import { Writable } from 'node:stream';

/**
 * Writable that keeps everything written to it
 */
export class MemoryStream extends Writable {
  readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }

  /** Parse NDJSON output */
  lines(): Array<{ type: string; data: Record<string, unknown> }> {
    return this.text()
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => JSON.parse(line));
  }
}
