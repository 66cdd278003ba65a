/**
 * Host I/O for Quill programs.
 *
 * The interpreter writes whole lines and reads whole lines; where they go is
 * up to the host. `ConsoleIO` talks to the process, `BufferedIO` keeps
 * everything in memory.
 */

import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';

export interface HostIO {
  /** Write one line of program output. */
  output(line: string): void;
  /** Read one line of input, without its newline. Null at end of input. */
  readLine(): string | null;
}

/**
 * Line reader over a file descriptor, read synchronously in chunks.
 */
class SyncLineReader {
  private pending = '';
  private exhausted = false;
  private fd: number | null = null;
  // Holds back the bytes of a character split across two chunks
  private readonly decoder = new StringDecoder('utf8');

  constructor(private readonly path: string) {}

  next(): string | null {
    for (;;) {
      const newline = this.pending.indexOf('\n');
      if (newline >= 0) {
        const line = this.pending.slice(0, newline);
        this.pending = this.pending.slice(newline + 1);
        return line.replace(/\r$/, '');
      }
      if (this.exhausted) {
        if (this.pending.length === 0) return null;
        const rest = this.pending;
        this.pending = '';
        return rest;
      }
      this.fill();
    }
  }

  private fill(): void {
    if (this.fd === null) {
      this.fd = fs.openSync(this.path, 'rs');
    }
    const buf = Buffer.alloc(4096);
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(this.fd, buf, 0, buf.length, null);
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'EOF') {
        bytesRead = 0;
      } else {
        throw e;
      }
    }
    if (bytesRead === 0) {
      this.pending += this.decoder.end();
      this.exhausted = true;
      fs.closeSync(this.fd);
      this.fd = null;
      return;
    }
    this.pending += this.decoder.write(buf.subarray(0, bytesRead));
  }
}

export class ConsoleIO implements HostIO {
  private readonly reader: SyncLineReader;

  constructor(inputPath = '/dev/stdin') {
    this.reader = new SyncLineReader(inputPath);
  }

  output(line: string): void {
    process.stdout.write(line + '\n');
  }

  readLine(): string | null {
    return this.reader.next();
  }
}

/**
 * In-memory I/O: input lines are supplied up front, output lines are
 * collected in order.
 */
export class BufferedIO implements HostIO {
  readonly lines: string[] = [];
  private readonly input: string[];

  constructor(input: string[] = []) {
    this.input = [...input];
  }

  output(line: string): void {
    this.lines.push(line);
  }

  readLine(): string | null {
    return this.input.shift() ?? null;
  }

  /** All output so far, newline-terminated. */
  get text(): string {
    return this.lines.map(l => l + '\n').join('');
  }
}
