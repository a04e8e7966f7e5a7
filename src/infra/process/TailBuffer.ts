import { StringDecoder } from 'node:string_decoder';

/**
 * Keeps the last `maxLines` lines of a stream.
 * Multi-byte characters split across chunks are reassembled.
 */
export class TailBuffer {
  private lines: string[] = [];
  private partial = '';
  private received = 0;
  private readonly decoder = new StringDecoder('utf8');

  constructor(private readonly maxLines = 20) {}

  push(chunk: Buffer | string): void {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    this.received += chunk.length;
    const parts = (this.partial + text).split(/\r?\n/);
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts);
    if (this.lines.length > this.maxLines) {
      this.lines = this.lines.slice(-this.maxLines);
    }
  }

  get isEmpty(): boolean {
    return this.received === 0;
  }

  toString(): string {
    const all = this.partial ? [...this.lines, this.partial] : this.lines;
    return all.slice(-this.maxLines).join('\n');
  }
}
