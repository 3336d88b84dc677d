import {
  DataDescriptor,
  DescriptorTable,
  ListMember,
  MarkerDescriptor,
  PointDescriptor,
  RepeatedDescriptor,
  ScalarDescriptor,
  isDataDescriptor
} from '../types';
import { GroupCode } from '../group-codes';
import { markersOf } from './builders';

export type Axis = 'x' | 'y' | 'z';

export type LookupResult =
  | { type: 'unknown' }
  | { type: 'comment' }
  | { type: 'group-open'; name: string }
  | { type: 'group-close' }
  | { type: 'marker'; descriptor: MarkerDescriptor | null }
  | { type: 'scalar'; descriptor: ScalarDescriptor }
  | { type: 'point'; descriptor: PointDescriptor; axis: Axis }
  | { type: 'member'; descriptor: RepeatedDescriptor; member: ListMember };

type Candidate = Exclude<LookupResult, { type: 'unknown' | 'comment' | 'group-open' | 'group-close' | 'marker' }>;

/**
 * Per-assembly lookup state: the open 102 group and the pending node of every repeated field
 */
export class FieldCursor {
  private currentGroup: string | null = null;
  private readonly pending = new Map<string, Set<string>>();

  get openGroup(): string | null {
    return this.currentGroup;
  }

  enterGroup(name: string): void {
    this.currentGroup = name;
  }

  leaveGroup(): void {
    this.currentGroup = null;
  }

  /**
   * Record a member arrival. Returns true when it starts a new list node:
   * there is no pending node, the member opens nodes, or the pending node already holds it.
   */
  advance(descriptor: RepeatedDescriptor, listMember: ListMember): boolean {
    const seen = this.pending.get(descriptor.key);
    const opens = descriptor.openOn === listMember.code;
    const startsNode = !seen || opens || seen.has(listMember.key);
    const current = startsNode ? new Set<string>() : seen;
    current.add(listMember.key);

    const lastMember = descriptor.members[descriptor.members.length - 1];
    if (descriptor.openOn === undefined && lastMember.key === listMember.key) {
      this.pending.delete(descriptor.key);
    } else {
      this.pending.set(descriptor.key, current);
    }
    return startsNode;
  }
}

function candidatesFor(descriptor: DataDescriptor, code: number): Candidate[] {
  switch (descriptor.kind) {
    case 'scalar':
      return descriptor.code === code || descriptor.altCode === code ? [{ type: 'scalar', descriptor }] : [];
    case 'point': {
      const axes: Axis[] = descriptor.dimensions === 3 ? ['x', 'y', 'z'] : ['x', 'y'];
      const index = axes.findIndex((_, i) => descriptor.code + i * 10 === code);
      return index >= 0 ? [{ type: 'point', descriptor, axis: axes[index] }] : [];
    }
    case 'repeated':
      return descriptor.members
        .filter(listMember => listMember.code === code)
        .map(listMember => ({ type: 'member' as const, descriptor, member: listMember }));
  }
}

/**
 * Resolve one group code against a table.
 * Inside an open 102 group the field declared for that group wins; outside, the ungrouped one does.
 */
export function lookup(table: DescriptorTable, code: number, cursor: FieldCursor, value: string = ''): LookupResult {
  if (code === GroupCode.COMMENT) return { type: 'comment' };
  if (code === GroupCode.APPLICATION_GROUP) {
    if (value.startsWith('{')) return { type: 'group-open', name: value.slice(1).trim() };
    if (value.trim() === '}') return { type: 'group-close' };
    return { type: 'unknown' };
  }
  if (code === GroupCode.SUBCLASS_MARKER) {
    const found = markersOf(table.fields).find(descriptor => descriptor.value === value.trim());
    return { type: 'marker', descriptor: found ?? null };
  }

  const candidates = table.fields.filter(isDataDescriptor).flatMap(descriptor => candidatesFor(descriptor, code));
  if (candidates.length === 0) return { type: 'unknown' };

  const group = cursor.openGroup;
  const preferred = candidates.find(candidate =>
    group === null ? candidate.descriptor.group === undefined : candidate.descriptor.group === group
  );
  return preferred ?? candidates[0];
}
