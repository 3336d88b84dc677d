import { DxfError, DxfErrorCode, OwnershipError } from '../../errors/types';
import {
  DataDescriptor,
  DescriptorTable,
  FieldValue,
  ListNodeValue,
  Point3,
  isDataDescriptor,
  isPoint3
} from '../types';
import type { EntityChain } from './entity-chain';
import { OwnedList } from './owned-list';

export type EntityState = 'live' | 'released';

/**
 * Plain-data view of an entity, used for comparison and debugging
 */
export interface EntitySnapshot {
  kind: string;
  fields: Record<string, FieldValue>;
  lists: Record<string, ListNodeValue[]>;
}

/**
 * One assembled entity or object.
 * Scalar and point fields live in `fields`; each repeated field owns an OwnedList.
 */
export class DxfEntity {
  readonly kind: string;
  /** Next entity of the same kind in drawing order */
  next: DxfEntity | null = null;
  /** Chain this entity is linked into, until that chain is freed */
  chain: EntityChain | null = null;
  private readonly descriptors = new Map<string, DataDescriptor>();
  private fields = new Map<string, FieldValue>();
  private lists = new Map<string, OwnedList<ListNodeValue>>();
  private lifecycle: EntityState = 'live';

  constructor(readonly table: DescriptorTable) {
    this.kind = table.kind;
    const defaults = table.defaults();
    for (const descriptor of table.fields) {
      if (!isDataDescriptor(descriptor)) continue;
      this.descriptors.set(descriptor.key, descriptor);
      if (descriptor.kind === 'repeated') {
        this.lists.set(descriptor.key, new OwnedList<ListNodeValue>(`${table.kind}.${descriptor.key}`));
        continue;
      }
      const value = defaults[descriptor.key];
      if (value === undefined) {
        throw new DxfError(
          `No default declared for ${table.kind}.${descriptor.key}`,
          DxfErrorCode.FIELD_TYPE,
          undefined,
          { kind: table.kind, key: descriptor.key }
        );
      }
      this.fields.set(descriptor.key, isPoint3(value) ? { ...value } : value);
    }
  }

  get state(): EntityState {
    return this.lifecycle;
  }

  get isReleased(): boolean {
    return this.lifecycle === 'released';
  }

  /**
   * Borrowed read; points come back as frozen copies
   */
  get(key: string): FieldValue {
    this.assertLive();
    const value = this.fields.get(key);
    if (value === undefined) throw this.unknownField(key);
    return isPoint3(value) ? Object.freeze({ ...value }) : value;
  }

  getNumber(key: string): number {
    const value = this.get(key);
    if (typeof value !== 'number') throw this.wrongType(key, 'number');
    return value;
  }

  getString(key: string): string {
    const value = this.get(key);
    if (typeof value !== 'string') throw this.wrongType(key, 'string');
    return value;
  }

  getPoint(key: string): Readonly<Point3> {
    const value = this.get(key);
    if (!isPoint3(value)) throw this.wrongType(key, 'point');
    return value;
  }

  set(key: string, value: FieldValue): void {
    this.assertLive();
    const descriptor = this.descriptors.get(key);
    if (!descriptor || descriptor.kind === 'repeated') throw this.unknownField(key);
    if (descriptor.kind === 'point') {
      if (!isPoint3(value)) throw this.wrongType(key, 'point');
      this.fields.set(key, { x: value.x, y: value.y, z: value.z });
      return;
    }
    switch (descriptor.type) {
      case 'string':
        if (typeof value !== 'string') throw this.wrongType(key, 'string');
        break;
      case 'double':
        if (typeof value !== 'number') throw this.wrongType(key, 'number');
        break;
      case 'integer':
      case 'boolean':
      case 'handle':
        if (typeof value !== 'number' || !Number.isInteger(value)) throw this.wrongType(key, 'integer');
        break;
    }
    this.fields.set(key, value);
  }

  list(key: string): OwnedList<ListNodeValue> {
    this.assertLive();
    const list = this.lists.get(key);
    if (!list) throw this.unknownField(key);
    return list;
  }

  hasField(key: string): boolean {
    return this.fields.has(key) || this.lists.has(key);
  }

  /** Every repeated list, including released ones */
  ownedLists(): OwnedList<ListNodeValue>[] {
    return Array.from(this.lists.values());
  }

  snapshot(): EntitySnapshot {
    this.assertLive();
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of this.fields) {
      fields[key] = isPoint3(value) ? { ...value } : value;
    }
    const lists: Record<string, ListNodeValue[]> = {};
    for (const [key, list] of this.lists) {
      lists[key] = list.toArray().map(node => ({ ...node }));
    }
    return { kind: this.kind, fields, lists };
  }

  /**
   * Deep copy, detached from any chain
   */
  clone(): DxfEntity {
    this.assertLive();
    const copy = new DxfEntity(this.table);
    for (const [key, value] of this.fields) {
      copy.fields.set(key, isPoint3(value) ? { ...value } : value);
    }
    for (const [key, list] of this.lists) {
      const target = copy.list(key);
      for (const node of list) target.append({ ...node });
    }
    return copy;
  }

  /**
   * Release the entity's own fields. Fails, leaving the entity live,
   * while a repeated list still holds nodes or a successor is still linked.
   */
  release(): void {
    this.assertLive();
    for (const [key, list] of this.lists) {
      if (!list.isReleased && !list.isEmpty) {
        throw new OwnershipError(`Cannot free ${this.kind}: list "${key}" has not been released`, {
          kind: this.kind,
          list: key
        });
      }
    }
    if (this.next !== null) {
      throw new OwnershipError(`Cannot free ${this.kind}: next entity is still linked`, { kind: this.kind });
    }
    if (this.chain !== null) {
      throw new OwnershipError(`Cannot free ${this.kind}: it is still linked into a ${this.chain.kind} chain`, {
        kind: this.kind
      });
    }
    this.fields = new Map();
    this.lists = new Map();
    this.lifecycle = 'released';
  }

  private assertLive(): void {
    if (this.lifecycle === 'released') {
      throw new OwnershipError(`Use of released ${this.kind} entity`, { kind: this.kind });
    }
  }

  private unknownField(key: string): DxfError {
    return new DxfError(`${this.kind} has no field "${key}"`, DxfErrorCode.FIELD_TYPE, undefined, {
      kind: this.kind,
      key
    });
  }

  private wrongType(key: string, expected: string): DxfError {
    return new DxfError(`${this.kind}.${key} is not a ${expected}`, DxfErrorCode.FIELD_TYPE, undefined, {
      kind: this.kind,
      key
    });
  }
}
