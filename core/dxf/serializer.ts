import isEqual from 'lodash/isEqual';
import { DxfError, DxfErrorCode, ErrorReporter, VersionError } from '../errors/types';
import { getDefaultReporter } from '../errors/reporter';
import { ILogger } from '../logging/ILogger';
import { defaultLogger } from '../logging/DefaultLogger';
import { emptyMemberValue } from './descriptors/builders';
import { GroupCode, formatValue } from './group-codes';
import { formatTags } from './io/tag-writer';
import { LineSink } from './io/line-sink';
import { DxfEntity } from './ownership/entity';
import {
  ApplicationGroup,
  DataDescriptor,
  DescriptorTable,
  DxfTag,
  FieldDefaults,
  FieldDescriptor
} from './types';
import { VersionContext, VersionThreshold, isVersionInRange, versionName } from './version';

export interface SerializeOptions {
  reporter?: ErrorReporter;
  logger?: ILogger;
}

const LOG_SOURCE = 'Serializer';

interface SerializeRun {
  entity: DxfEntity;
  table: DescriptorTable;
  ctx: VersionContext;
  defaults: FieldDefaults;
}

function checkKindVersion(table: DescriptorTable, ctx: VersionContext, options: SerializeOptions): void {
  if (table.minVersion === undefined || ctx.version >= table.minVersion) return;
  const message = `${table.kind} does not exist in ${versionName(ctx.version)} (requires ${versionName(table.minVersion)})`;
  const details = { kind: table.kind, version: ctx.version };
  if (ctx.strict) {
    throw new VersionError(message, details);
  }
  (options.reporter ?? getDefaultReporter()).addWarning(message, DxfErrorCode.VERSION_MISMATCH, details);
  (options.logger ?? defaultLogger).warn(LOG_SOURCE, message, details, { kind: table.kind });
}

function dataTags(run: SerializeRun, descriptor: DataDescriptor): DxfTag[] {
  const { entity, ctx, defaults } = run;
  const details = { kind: entity.kind, key: descriptor.key };

  switch (descriptor.kind) {
    case 'scalar': {
      const value = descriptor.countOf !== undefined ? entity.list(descriptor.countOf).length : entity.get(descriptor.key);
      if (!descriptor.required && isEqual(value, defaults[descriptor.key])) return [];
      if (descriptor.group !== undefined && value === '') return [];
      const code = descriptor.altCode !== undefined && ctx.largeGraphicsDataSize ? descriptor.altCode : descriptor.code;
      return [{ code, value: formatValue(value, descriptor.type, { ...details, groupCode: code }) }];
    }
    case 'point': {
      const value = entity.getPoint(descriptor.key);
      if (!descriptor.required && isEqual(value, defaults[descriptor.key])) return [];
      const tags: DxfTag[] = [
        { code: descriptor.code, value: formatValue(value.x, 'double', details) },
        { code: descriptor.code + 10, value: formatValue(value.y, 'double', details) }
      ];
      if (descriptor.dimensions === 3) {
        tags.push({ code: descriptor.code + 20, value: formatValue(value.z, 'double', details) });
      }
      return tags;
    }
    case 'repeated': {
      const tags: DxfTag[] = [];
      for (const node of entity.list(descriptor.key)) {
        for (const listMember of descriptor.members) {
          if (listMember.optional && node[listMember.key] === emptyMemberValue(listMember)) continue;
          tags.push({
            code: listMember.code,
            value: formatValue(node[listMember.key], listMember.type, { ...details, groupCode: listMember.code })
          });
        }
      }
      return tags;
    }
  }
}

function fieldTags(run: SerializeRun, descriptor: FieldDescriptor): DxfTag[] {
  if (!isVersionInRange(run.ctx.version, descriptor.minVersion, descriptor.maxVersion)) return [];
  if (descriptor.kind === 'marker') {
    return [{ code: GroupCode.SUBCLASS_MARKER, value: descriptor.value }];
  }
  return dataTags(run, descriptor);
}

function groupOf(descriptor: FieldDescriptor): ApplicationGroup | undefined {
  return descriptor.kind === 'marker' ? undefined : descriptor.group;
}

/**
 * Canonical tag sequence for one entity: group 0, then the table in order,
 * minus out-of-version fields, unrequired defaults and empty application groups
 */
export function serialize(
  entity: DxfEntity,
  table: DescriptorTable,
  ctx: VersionContext,
  options: SerializeOptions = {}
): DxfTag[] {
  if (entity.kind !== table.kind) {
    throw new DxfError(`Cannot serialize ${entity.kind} with the ${table.kind} table`, DxfErrorCode.FIELD_TYPE, undefined, {
      kind: entity.kind
    });
  }
  checkKindVersion(table, ctx, options);

  const run: SerializeRun = { entity, table, ctx, defaults: table.defaults() };
  const tags: DxfTag[] = [{ code: GroupCode.ENTITY_TYPE, value: table.kind }];
  const fields = table.fields;

  for (let i = 0; i < fields.length; ) {
    const group = groupOf(fields[i]);
    if (group === undefined) {
      tags.push(...fieldTags(run, fields[i]));
      i++;
      continue;
    }
    const members: DxfTag[] = [];
    while (i < fields.length && groupOf(fields[i]) === group) {
      members.push(...fieldTags(run, fields[i]));
      i++;
    }
    if (members.length > 0 && ctx.version >= VersionThreshold.APPLICATION_GROUPS) {
      tags.push({ code: GroupCode.APPLICATION_GROUP, value: `{${group}` }, ...members, {
        code: GroupCode.APPLICATION_GROUP,
        value: '}'
      });
    }
  }
  return tags;
}

/**
 * Serialize and flush one entity in a single sink write
 */
export function writeEntity(
  sink: LineSink,
  entity: DxfEntity,
  ctx: VersionContext,
  options: SerializeOptions = {}
): void {
  const text = formatTags(serialize(entity, entity.table, ctx, options));
  sink.write(text);
  (options.logger ?? defaultLogger).debug(LOG_SOURCE, `Wrote ${entity.kind}`, { bytes: text.length }, {
    source: sink.name,
    kind: entity.kind
  });
}

/**
 * Serialize every entity first; the sink sees one write or none
 */
export function writeEntities(
  sink: LineSink,
  entities: Iterable<DxfEntity>,
  ctx: VersionContext,
  options: SerializeOptions = {}
): void {
  const parts: string[] = [];
  let count = 0;
  for (const entity of entities) {
    parts.push(formatTags(serialize(entity, entity.table, ctx, options)));
    count++;
  }
  sink.write(parts.join(''));
  (options.logger ?? defaultLogger).debug(LOG_SOURCE, `Wrote ${count} entities`, { count }, { source: sink.name });
}
