import { createReadStream } from 'node:fs';
import { access, constants } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { LineSource } from '../../domain/index.js';

/**
 * Pulls lines from a readable stream through node:readline, one at a time.
 *
 * The stream is released when it is exhausted; call `close()` to stop early.
 */
export class StreamLineSource implements LineSource {
  private readonly input: Readable;
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(input: Readable) {
    this.input = input;
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async nextLine(): Promise<string | null> {
    if (this.closed) return null;
    const next = await this.lines.next();
    if (next.done === true) {
      this.close();
      return null;
    }
    return next.value;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rl.close();
    this.input.destroy();
  }
}

/**
 * Line source over a file on disk.
 *
 * Use `open()` so a missing or unreadable file fails before the first read.
 */
export class FileLineSource extends StreamLineSource {
  constructor(public readonly path: string) {
    super(createReadStream(path, { encoding: 'utf-8' }));
  }

  static async open(path: string): Promise<FileLineSource> {
    await access(path, constants.R_OK);
    return new FileLineSource(path);
  }
}
