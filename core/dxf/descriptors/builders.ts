import { DxfError, DxfErrorCode } from '../../errors/types';
import {
  DescriptorTable,
  FieldDescriptor,
  ListMember,
  MarkerDescriptor,
  PointDescriptor,
  RepeatedDescriptor,
  ScalarDescriptor,
  ValueType
} from '../types';
import { VersionThreshold } from '../version';

type ScalarOptions = Omit<ScalarDescriptor, 'kind' | 'key' | 'code' | 'type'>;
type PointOptions = Partial<Omit<PointDescriptor, 'kind' | 'key' | 'code'>>;
type RepeatedOptions = Omit<RepeatedDescriptor, 'kind' | 'key' | 'members'>;
type MarkerOptions = Omit<MarkerDescriptor, 'kind' | 'value'>;
type MemberOptions = Pick<ListMember, 'optional'>;

export function scalar(key: string, code: number, type: ValueType, options: ScalarOptions = {}): ScalarDescriptor {
  return { kind: 'scalar', key, code, type, ...options };
}

export function point(key: string, code: number, options: PointOptions = {}): PointDescriptor {
  return { kind: 'point', key, code, dimensions: 3, ...options };
}

export function member(key: string, code: number, type: ValueType = 'double', options: MemberOptions = {}): ListMember {
  return { key, code, type, ...options };
}

/**
 * Value a member holds until its tag is read
 */
export function emptyMemberValue(listMember: ListMember): string | number {
  return listMember.type === 'string' ? '' : 0;
}

export function repeated(key: string, members: readonly ListMember[], options: RepeatedOptions = {}): RepeatedDescriptor {
  return { kind: 'repeated', key, members, ...options };
}

/**
 * Subclass marker, R13 and later unless told otherwise
 */
export function marker(value: string, options: MarkerOptions = {}): MarkerDescriptor {
  return { kind: 'marker', value, minVersion: VersionThreshold.SUBCLASS_MARKERS, ...options };
}

function invalidTable(kind: string, message: string): DxfError {
  return new DxfError(`Invalid descriptor table ${kind}: ${message}`, DxfErrorCode.INVALID_CONFIG, undefined, { kind });
}

/**
 * Check a table for consistency before it is registered
 */
export function defineTable(table: DescriptorTable): DescriptorTable {
  const keys = new Set<string>();
  const repeatedKeys = new Set<string>();
  const defaults = table.defaults();

  for (const descriptor of table.fields) {
    if (descriptor.kind === 'marker') continue;
    if (keys.has(descriptor.key)) throw invalidTable(table.kind, `duplicate key "${descriptor.key}"`);
    keys.add(descriptor.key);
    if (descriptor.kind === 'repeated') {
      if (descriptor.members.length === 0) throw invalidTable(table.kind, `"${descriptor.key}" has no members`);
      for (const listMember of descriptor.members) {
        if (listMember.optional && (descriptor.openOn === undefined || descriptor.openOn === listMember.code)) {
          throw invalidTable(
            table.kind,
            `optional member "${listMember.key}" of "${descriptor.key}" needs another member to open nodes`
          );
        }
      }
      repeatedKeys.add(descriptor.key);
    } else if (defaults[descriptor.key] === undefined) {
      throw invalidTable(table.kind, `no default for "${descriptor.key}"`);
    }
  }

  for (const descriptor of table.fields) {
    if (descriptor.kind === 'scalar' && descriptor.countOf !== undefined && !repeatedKeys.has(descriptor.countOf)) {
      throw invalidTable(table.kind, `"${descriptor.key}" counts unknown list "${descriptor.countOf}"`);
    }
  }
  return table;
}

export function markersOf(fields: readonly FieldDescriptor[]): MarkerDescriptor[] {
  return fields.filter((descriptor): descriptor is MarkerDescriptor => descriptor.kind === 'marker');
}
