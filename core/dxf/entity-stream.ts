import isEqual from 'lodash/isEqual';
import { DxfErrorCode, ErrorDetails, ErrorReporter, MalformedValueError } from '../errors/types';
import { getDefaultReporter } from '../errors/reporter';
import { ILogger } from '../logging/ILogger';
import { defaultLogger } from '../logging/DefaultLogger';
import { assemble } from './assembler';
import { TagReader } from './io/tag-reader';
import { DxfEntity } from './ownership/entity';
import { EntityChain } from './ownership/entity-chain';
import { EntityRegistry } from './registry';
import { VersionContext } from './version';
// Registers the built-in descriptor tables
import './entities';

export interface ReadEntitiesOptions {
  reporter?: ErrorReporter;
  logger?: ILogger;
  registry?: EntityRegistry;
  /** Skip an entity with a malformed value and resume at the next group 0 */
  recover?: boolean;
}

const STREAM_TERMINATORS = new Set(['ENDSEC', 'EOF']);

/**
 * Pull-based sequence of entities from one tag reader.
 * Group 0 of each entity is the opener of the next.
 */
export class EntityStream implements Iterable<DxfEntity> {
  private readonly LOG_SOURCE = 'EntityStream';
  private readonly reporter: ErrorReporter;
  private readonly logger: ILogger;
  private readonly registry: EntityRegistry;
  /** undefined before the first opener has been read, null once input is exhausted */
  private pendingName: string | null | undefined = undefined;
  private finished = false;

  constructor(
    private readonly reader: TagReader,
    private readonly ctx: VersionContext,
    private readonly options: ReadEntitiesOptions = {}
  ) {
    this.reporter = options.reporter ?? getDefaultReporter();
    this.logger = options.logger ?? defaultLogger;
    this.registry = options.registry ?? EntityRegistry.getInstance();
  }

  /** The terminator that ended the stream, once it has ended */
  get terminator(): string | null {
    return this.finished && this.pendingName !== undefined ? this.pendingName : null;
  }

  next(): DxfEntity | null {
    if (this.finished) return null;
    if (this.pendingName === undefined) {
      this.pendingName = this.readOpener();
    }

    for (;;) {
      const name = this.pendingName;
      if (name === null || STREAM_TERMINATORS.has(name)) {
        this.finished = true;
        return null;
      }

      const table = this.registry.find(name);
      if (!table) {
        this.report(DxfErrorCode.UNKNOWN_ENTITY_KIND, `Skipping unsupported entity kind ${name}`, { kind: name });
        this.pendingName = this.reader.skipToTerminator();
        continue;
      }

      try {
        const { entity, nextName } = assemble(this.reader, table, this.ctx, {
          reporter: this.reporter,
          logger: this.logger
        });
        this.pendingName = nextName;
        return entity;
      } catch (error) {
        if (this.options.recover && error instanceof MalformedValueError) {
          this.report(DxfErrorCode.ENTITY_SKIPPED, `Skipped malformed ${name} entity: ${error.message}`, {
            kind: name,
            rawValue: error.rawValue
          });
          this.pendingName = this.reader.skipToTerminator();
          continue;
        }
        this.finished = true;
        throw error;
      }
    }
  }

  *[Symbol.iterator](): Iterator<DxfEntity> {
    for (let entity = this.next(); entity; entity = this.next()) {
      yield entity;
    }
  }

  private readOpener(): string | null {
    if (this.reader.atEndOfInput()) return null;
    const first = this.reader.nextTag();
    if (first.type === 'end') return first.name;
    this.report(DxfErrorCode.UNKNOWN_GROUP_CODE, `Expected group 0, found group ${first.tag.code}`, {
      groupCode: first.tag.code
    });
    return this.reader.skipToTerminator();
  }

  private report(code: DxfErrorCode, message: string, extra: ErrorDetails): void {
    const details = this.reader.details(extra);
    this.reporter.addWarning(message, code, details);
    this.logger.warn(this.LOG_SOURCE, message, details, { source: this.reader.source });
  }
}

/**
 * Read every entity up to ENDSEC, EOF or the end of input
 */
export function readEntities(reader: TagReader, ctx: VersionContext, options: ReadEntitiesOptions = {}): DxfEntity[] {
  return Array.from(new EntityStream(reader, ctx, options));
}

/**
 * Link entities into one chain per kind, keeping drawing order within each kind
 */
export function collectChains(entities: Iterable<DxfEntity>): Map<string, EntityChain> {
  const chains = new Map<string, EntityChain>();
  for (const entity of entities) {
    let chain = chains.get(entity.kind);
    if (!chain) {
      chain = new EntityChain(entity.kind);
      chains.set(entity.kind, chain);
    }
    chain.append(entity);
  }
  return chains;
}

/**
 * Same kind, same field values, same list contents in the same order
 */
export function entitiesEqual(a: DxfEntity, b: DxfEntity): boolean {
  return isEqual(a.snapshot(), b.snapshot());
}
