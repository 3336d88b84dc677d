import fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { v4 as uuidv4 } from 'uuid';
import { IoFailureError, createErrorDetails } from '../../errors/types';

/**
 * Line-buffered character input consumed by the tag reader
 */
export interface LineSource {
  readonly name: string;
  readonly closed: boolean;
  /** Next physical line without its terminator, or null at end of input */
  readLine(): string | null;
  /** True when no line is left, without consuming one */
  atEnd(): boolean;
  close(): void;
}

function closedError(name: string): IoFailureError {
  return new IoFailureError(`Read from closed source ${name}`, undefined, { source: name });
}

/**
 * In-memory text split on CRLF, CR or LF
 */
export class StringLineSource implements LineSource {
  private readonly lines: string[];
  private index = 0;
  private isClosed = false;

  constructor(text: string, readonly name: string = `memory:${uuidv4()}`) {
    this.lines = text.split(/\r\n|\r|\n/);
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  readLine(): string | null {
    if (this.isClosed) throw closedError(this.name);
    if (this.index >= this.lines.length) return null;
    return this.lines[this.index++];
  }

  atEnd(): boolean {
    if (this.isClosed) throw closedError(this.name);
    return this.index >= this.lines.length;
  }

  close(): void {
    this.isClosed = true;
  }
}

/**
 * Blocking, chunked reads from a file on disk.
 * Closing the source from outside is how a caller cancels a read in progress.
 */
export class FileLineSource implements LineSource {
  readonly name: string;
  private fd: number | null;
  private readonly buffer: Buffer;
  private readonly decoder = new StringDecoder('utf8');
  private readonly lineBreak = /\r\n|\r|\n/g;
  private pending = '';
  private offset = 0;
  private eof = false;

  constructor(path: string, chunkSize: number = 64 * 1024) {
    this.name = path;
    this.buffer = Buffer.alloc(chunkSize);
    try {
      this.fd = fs.openSync(path, 'r');
    } catch (error) {
      throw new IoFailureError(`Failed to open ${path}`, error instanceof Error ? error : undefined, {
        ...createErrorDetails(error),
        source: path
      });
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }

  readLine(): string | null {
    for (;;) {
      const fd = this.openDescriptor();
      this.lineBreak.lastIndex = this.offset;
      const match = this.lineBreak.exec(this.pending);
      // A trailing CR may be the first half of a CRLF split across chunks
      const splitCrLf = match !== null && match[0] === '\r' && match.index === this.pending.length - 1 && !this.eof;
      if (match && !splitCrLf) {
        const line = this.pending.slice(this.offset, match.index);
        this.offset = match.index + match[0].length;
        return line;
      }
      if (this.eof) {
        if (this.offset >= this.pending.length) return null;
        const line = this.pending.slice(this.offset);
        this.offset = this.pending.length;
        return line;
      }
      this.fill(fd);
    }
  }

  atEnd(): boolean {
    for (;;) {
      const fd = this.openDescriptor();
      if (this.offset < this.pending.length) return false;
      if (this.eof) return true;
      this.fill(fd);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      throw new IoFailureError(`Failed to close ${this.name}`, error instanceof Error ? error : undefined, {
        ...createErrorDetails(error),
        source: this.name
      });
    }
  }

  private openDescriptor(): number {
    if (this.fd === null) throw closedError(this.name);
    return this.fd;
  }

  private fill(fd: number): void {
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(fd, this.buffer, 0, this.buffer.length, null);
    } catch (error) {
      throw new IoFailureError(`Failed to read ${this.name}`, error instanceof Error ? error : undefined, {
        ...createErrorDetails(error),
        source: this.name
      });
    }
    const rest = this.pending.slice(this.offset);
    this.offset = 0;
    if (bytesRead === 0) {
      this.eof = true;
      this.pending = rest + this.decoder.end();
      return;
    }
    this.pending = rest + this.decoder.write(this.buffer.subarray(0, bytesRead));
  }
}
