import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { IoFailureError, createErrorDetails } from '../../errors/types';

/**
 * Character output the serializer flushes complete entities into
 */
export interface LineSink {
  readonly name: string;
  readonly closed: boolean;
  write(text: string): void;
  close(): void;
}

function closedError(name: string): IoFailureError {
  return new IoFailureError(`Write to closed sink ${name}`, undefined, { source: name });
}

export class StringLineSink implements LineSink {
  private readonly chunks: string[] = [];
  private isClosed = false;

  constructor(readonly name: string = `memory:${uuidv4()}`) {}

  get closed(): boolean {
    return this.isClosed;
  }

  write(text: string): void {
    if (this.isClosed) throw closedError(this.name);
    this.chunks.push(text);
  }

  close(): void {
    this.isClosed = true;
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export class FileLineSink implements LineSink {
  readonly name: string;
  private fd: number | null;

  constructor(path: string, flags: 'w' | 'a' = 'w') {
    this.name = path;
    try {
      this.fd = fs.openSync(path, flags);
    } catch (error) {
      throw new IoFailureError(`Failed to open ${path} for writing`, error instanceof Error ? error : undefined, {
        ...createErrorDetails(error),
        source: path
      });
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(text: string): void {
    if (this.fd === null) throw closedError(this.name);
    try {
      fs.writeSync(this.fd, text);
    } catch (error) {
      throw new IoFailureError(`Failed to write ${this.name}`, error instanceof Error ? error : undefined, {
        ...createErrorDetails(error),
        source: this.name
      });
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
}
