import { ErrorDetails, MalformedValueError, TruncatedError } from '../../errors/types';
import { ILogger } from '../../logging/ILogger';
import { defaultLogger } from '../../logging/DefaultLogger';
import { StreamPosition } from '../../../types/errors';
import { DxfTag } from '../types';
import { GroupCode } from '../group-codes';
import { LineSource } from './line-source';

export type TagResult =
  | { type: 'tag'; tag: DxfTag }
  /** Group 0 closes the current entity and names the next one */
  | { type: 'end'; name: string };

export interface TagReaderOptions {
  logger?: ILogger;
}

const CODE_PATTERN = /^[+-]?\d+$/;

/**
 * Pulls group-code/value pairs off a line source and owns the line counter
 */
export class TagReader {
  private readonly LOG_SOURCE = 'TagReader';
  private readonly logger: ILogger;
  private line = 0;

  constructor(private readonly input: LineSource, options: TagReaderOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /** Physical line number of the last consumed line */
  get lineNumber(): number {
    return this.line;
  }

  get source(): string {
    return this.input.name;
  }

  position(): StreamPosition {
    return { source: this.input.name, lineNumber: this.line };
  }

  details(extra?: ErrorDetails): ErrorDetails {
    return { source: this.input.name, lineNumber: this.line, ...extra };
  }

  nextTag(): TagResult {
    const codeLine = this.input.readLine();
    if (codeLine === null) {
      throw new TruncatedError(`Unexpected end of input in ${this.input.name} after line ${this.line}`, this.details());
    }
    this.line++;
    const valueLine = this.input.readLine();
    if (valueLine === null) {
      throw new TruncatedError(
        `Missing value line for group code "${codeLine.trim()}" in ${this.input.name} at line ${this.line}`,
        this.details()
      );
    }
    this.line++;

    const trimmed = codeLine.trim();
    if (!CODE_PATTERN.test(trimmed)) {
      throw new MalformedValueError(
        `Invalid group code "${codeLine}" in ${this.input.name} at line ${this.line - 1}`,
        codeLine,
        this.details({ lineNumber: this.line - 1 })
      );
    }
    const code = Number(trimmed);
    if (code === GroupCode.ENTITY_TYPE) {
      return { type: 'end', name: valueLine.trim() };
    }
    return { type: 'tag', tag: { code, value: valueLine } };
  }

  atEndOfInput(): boolean {
    return this.input.atEnd();
  }

  /**
   * Discard tags up to the next group 0 and return its value, or null at end of input
   */
  skipToTerminator(): string | null {
    const startLine = this.line;
    while (!this.atEndOfInput()) {
      const result = this.nextTag();
      if (result.type === 'end') {
        this.logger.debug(this.LOG_SOURCE, 'Skipped to next entity', {
          from: startLine,
          to: this.line,
          next: result.name
        }, { source: this.input.name });
        return result.name;
      }
    }
    return null;
  }
}
