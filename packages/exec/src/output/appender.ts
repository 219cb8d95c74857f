import { StringDecoder } from 'string_decoder';

/**
 * Receives subprocess output one line at a time, without the trailing newline.
 */
export interface OutputAppender {
  append(line: string): void;
}

/**
 * Streams lines to a writable stream, stdout by default.
 */
export class ConsoleOutputAppender implements OutputAppender {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  append(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Keeps every line in memory.
 */
export class BufferedOutputAppender implements OutputAppender {
  readonly lines: string[] = [];

  append(line: string): void {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

/**
 * Splits a chunked UTF-8 byte stream into lines. A trailing partial line, and
 * a character cut between chunks, are held until the next chunk or `flush()`.
 */
export class LineSplitter {
  private pending = '';
  private readonly decoder = new StringDecoder('utf8');

  constructor(private readonly sink: OutputAppender) {}

  push(chunk: Buffer | string): void {
    const text = this.pending + (typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
    const lines = text.split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.sink.append(line);
    }
  }

  flush(): void {
    this.pending += this.decoder.end();
    if (this.pending.length > 0) {
      this.sink.append(this.pending);
      this.pending = '';
    }
  }
}
