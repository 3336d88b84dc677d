import { OwnershipError } from '../../errors/types';
import { DxfEntity } from './entity';
import { freeEntityDeep } from './list-manager';

/**
 * Drawing-order chain of entities of one kind, linked through `next`
 */
export class EntityChain implements Iterable<DxfEntity> {
  private head: DxfEntity | null = null;
  private tail: DxfEntity | null = null;
  private count = 0;

  constructor(readonly kind: string) {}

  get length(): number {
    return this.count;
  }

  get first(): DxfEntity | null {
    return this.head;
  }

  append(entity: DxfEntity): void {
    if (entity.kind !== this.kind) {
      throw new OwnershipError(`Cannot append ${entity.kind} to a ${this.kind} chain`, {
        kind: entity.kind,
        chain: this.kind
      });
    }
    if (entity.chain !== null || entity.next !== null) {
      throw new OwnershipError(`${entity.kind} entity already belongs to a chain`, {
        kind: entity.kind,
        foreign: entity.chain !== this
      });
    }
    entity.chain = this;
    if (this.tail) {
      this.tail.next = entity;
    } else {
      this.head = entity;
    }
    this.tail = entity;
    this.count++;
  }

  *[Symbol.iterator](): Iterator<DxfEntity> {
    for (let entity = this.head; entity; entity = entity.next) {
      yield entity;
    }
  }

  toArray(): DxfEntity[] {
    return Array.from(this);
  }

  /**
   * Head-to-tail teardown: capture `next`, detach it, then free the entity and its lists
   */
  free(): void {
    let entity = this.head;
    this.head = null;
    this.tail = null;
    this.count = 0;
    while (entity) {
      const next = entity.next;
      entity.next = null;
      entity.chain = null;
      freeEntityDeep(entity);
      entity = next;
    }
  }
}
