import { DxfErrorCode, ErrorDetails, ErrorReporter } from '../errors/types';
import { getDefaultReporter } from '../errors/reporter';
import { ILogger } from '../logging/ILogger';
import { defaultLogger } from '../logging/DefaultLogger';
import { convertValue, fitsWireType, parseDouble } from './group-codes';
import { TagReader } from './io/tag-reader';
import { DxfEntity } from './ownership/entity';
import { freeEntityDeep } from './ownership/list-manager';
import { Axis, FieldCursor, lookup } from './descriptors/field-cursor';
import { emptyMemberValue } from './descriptors/builders';
import { DataDescriptor, DescriptorTable, DxfTag, ListNodeValue, Point3, RepeatedDescriptor, ScalarDescriptor } from './types';
import { VersionContext, isVersionInRange } from './version';

export interface AssembleOptions {
  reporter?: ErrorReporter;
  logger?: ILogger;
}

export interface AssembleResult {
  entity: DxfEntity;
  /** Value of the group 0 tag that ended the entity */
  nextName: string;
}

const LOG_SOURCE = 'EntityAssembler';

interface AssemblyRun {
  reader: TagReader;
  table: DescriptorTable;
  ctx: VersionContext;
  entity: DxfEntity;
  cursor: FieldCursor;
  reporter: ErrorReporter;
  logger: ILogger;
  /** countOf scalars that appeared in the stream */
  declaredCounts: Set<string>;
}

function warn(run: AssemblyRun, code: DxfErrorCode, message: string, extra?: ErrorDetails): void {
  const details = run.reader.details({ kind: run.table.kind, ...extra });
  run.reporter.addWarning(message, code, details);
  run.logger.warn(LOG_SOURCE, message, details, { source: run.reader.source, lineNumber: run.reader.lineNumber });
}

function withAxis(point: Readonly<Point3>, axis: Axis, value: number): Point3 {
  switch (axis) {
    case 'x':
      return { ...point, x: value };
    case 'y':
      return { ...point, y: value };
    case 'z':
      return { ...point, z: value };
  }
}

function emptyNode(descriptor: RepeatedDescriptor): ListNodeValue {
  const node: ListNodeValue = {};
  for (const listMember of descriptor.members) {
    node[listMember.key] = emptyMemberValue(listMember);
  }
  return node;
}

function convert(run: AssemblyRun, tag: DxfTag, type: ScalarDescriptor['type']): string | number {
  const value = convertValue(tag.value, type, run.reader.details({ groupCode: tag.code, kind: run.table.kind }));
  if (typeof value === 'number' && type !== 'double' && type !== 'handle' && !fitsWireType(tag.code, value)) {
    warn(run, DxfErrorCode.OUT_OF_RANGE_VALUE, `Value ${value} out of range for group code ${tag.code}`, {
      groupCode: tag.code
    });
  }
  return value;
}

/**
 * Strict mode treats a field outside its version range like an unknown code
 */
function acceptsVersion(run: AssemblyRun, descriptor: DataDescriptor, tag: DxfTag): boolean {
  if (!run.ctx.strict || isVersionInRange(run.ctx.version, descriptor.minVersion, descriptor.maxVersion)) {
    return true;
  }
  warn(run, DxfErrorCode.UNKNOWN_GROUP_CODE, `Group code ${tag.code} does not apply to this DXF version`, {
    groupCode: tag.code
  });
  return false;
}

function applyTag(run: AssemblyRun, tag: DxfTag): void {
  const found = lookup(run.table, tag.code, run.cursor, tag.value);
  switch (found.type) {
    case 'comment': {
      const details = run.reader.details({ kind: run.table.kind });
      run.reporter.addInfo(`DXF comment: ${tag.value}`, DxfErrorCode.DXF_COMMENT, details);
      run.logger.debug(LOG_SOURCE, 'DXF comment', { comment: tag.value }, { source: run.reader.source });
      return;
    }
    case 'group-open':
      run.cursor.enterGroup(found.name);
      return;
    case 'group-close':
      run.cursor.leaveGroup();
      return;
    case 'marker':
      if (!found.descriptor) {
        warn(run, DxfErrorCode.BAD_SUBCLASS_MARKER, `Bad subclass marker "${tag.value}" for ${run.table.kind}`, {
          groupCode: tag.code
        });
      }
      return;
    case 'unknown':
      warn(run, DxfErrorCode.UNKNOWN_GROUP_CODE, `Unknown group code ${tag.code} in ${run.table.kind}`, {
        groupCode: tag.code
      });
      return;
    case 'scalar': {
      if (!acceptsVersion(run, found.descriptor, tag)) return;
      run.entity.set(found.descriptor.key, convert(run, tag, found.descriptor.type));
      if (found.descriptor.countOf !== undefined) run.declaredCounts.add(found.descriptor.key);
      return;
    }
    case 'point': {
      if (!acceptsVersion(run, found.descriptor, tag)) return;
      const coordinate = parseDouble(tag.value, run.reader.details({ groupCode: tag.code, kind: run.table.kind }));
      const key = found.descriptor.key;
      run.entity.set(key, withAxis(run.entity.getPoint(key), found.axis, coordinate));
      return;
    }
    case 'member': {
      if (!acceptsVersion(run, found.descriptor, tag)) return;
      const value = convert(run, tag, found.member.type);
      const list = run.entity.list(found.descriptor.key);
      if (run.cursor.advance(found.descriptor, found.member)) {
        list.append(emptyNode(found.descriptor));
      }
      const node = list.last();
      if (node) node[found.member.key] = value;
      return;
    }
  }
}

/**
 * Backfill empty strings, then check declared counts and value ranges
 */
function postPass(run: AssemblyRun): void {
  const defaults = run.table.defaults();
  for (const descriptor of run.table.fields) {
    if (descriptor.kind !== 'scalar') continue;
    const { key } = descriptor;

    if (descriptor.type === 'string') {
      const fallback = defaults[key];
      if (run.entity.getString(key) === '' && typeof fallback === 'string' && fallback !== '') {
        run.entity.set(key, fallback);
      }
      continue;
    }

    const value = run.entity.getNumber(key);
    if (descriptor.countOf !== undefined && run.declaredCounts.has(key)) {
      const actual = run.entity.list(descriptor.countOf).length;
      if (actual !== value) {
        warn(run, DxfErrorCode.COUNT_MISMATCH, `${run.table.kind}.${key} declares ${value} but ${actual} were read`, {
          groupCode: descriptor.code
        });
      }
    }
    const outOfRange =
      (descriptor.range !== undefined && (value < descriptor.range.min || value > descriptor.range.max)) ||
      (descriptor.allowed !== undefined && !descriptor.allowed.includes(value));
    if (outOfRange) {
      warn(run, DxfErrorCode.OUT_OF_RANGE_VALUE, `${run.table.kind}.${key} has out-of-range value ${value}`, {
        groupCode: descriptor.code
      });
    }
  }
}

/**
 * Build one entity from the tags following its `0 KIND` opener.
 * Fails atomically: on any thrown error the partial entity is released and never returned.
 */
export function assemble(
  reader: TagReader,
  table: DescriptorTable,
  ctx: VersionContext,
  options: AssembleOptions = {}
): AssembleResult {
  const run: AssemblyRun = {
    reader,
    table,
    ctx,
    entity: new DxfEntity(table),
    cursor: new FieldCursor(),
    reporter: options.reporter ?? getDefaultReporter(),
    logger: options.logger ?? defaultLogger,
    declaredCounts: new Set()
  };

  try {
    for (;;) {
      const result = reader.nextTag();
      if (result.type === 'end') {
        postPass(run);
        run.logger.debug(LOG_SOURCE, `Assembled ${table.kind}`, { lineNumber: reader.lineNumber, next: result.name }, {
          source: reader.source,
          kind: table.kind
        });
        return { entity: run.entity, nextName: result.name };
      }
      applyTag(run, result.tag);
    }
  } catch (error) {
    freeEntityDeep(run.entity);
    throw error;
  }
}
