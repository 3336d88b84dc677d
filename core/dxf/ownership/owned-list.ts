import { OwnershipError } from '../../errors/types';

interface ListNode<T> {
  value: T;
  next: ListNode<T> | null;
}

/**
 * Singly linked, single-owner sequence backing a repeated field.
 * Nodes are only ever released together, head to tail, through `release`.
 */
export class OwnedList<T> implements Iterable<T> {
  private head: ListNode<T> | null = null;
  private tail: ListNode<T> | null = null;
  private count = 0;
  private released = false;

  constructor(readonly label: string = 'list') {}

  get length(): number {
    this.assertUsable();
    return this.count;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  get isReleased(): boolean {
    return this.released;
  }

  append(value: T): void {
    this.assertUsable();
    const node: ListNode<T> = { value, next: null };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.count++;
  }

  /** Borrowed reference to the most recent node, for in-place completion */
  last(): T | undefined {
    this.assertUsable();
    return this.tail?.value;
  }

  at(index: number): T | undefined {
    this.assertUsable();
    let node = this.head;
    for (let i = 0; node && i < index; i++) {
      node = node.next;
    }
    return index >= 0 ? node?.value : undefined;
  }

  *[Symbol.iterator](): Iterator<T> {
    this.assertUsable();
    for (let node = this.head; node; node = node.next) {
      yield node.value;
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * Transfer every node to a new list; this one is left empty and usable
   */
  moveOut(): OwnedList<T> {
    this.assertUsable();
    const target = new OwnedList<T>(this.label);
    target.head = this.head;
    target.tail = this.tail;
    target.count = this.count;
    this.head = null;
    this.tail = null;
    this.count = 0;
    return target;
  }

  /**
   * Tear the chain down head to tail. The successor is captured before each node is released.
   */
  release(onNode?: (value: T) => void): void {
    this.assertUsable();
    let node = this.head;
    this.head = null;
    this.tail = null;
    this.count = 0;
    this.released = true;
    while (node) {
      const next = node.next;
      node.next = null;
      onNode?.(node.value);
      node = next;
    }
  }

  private assertUsable(): void {
    if (this.released) {
      throw new OwnershipError(`Use of released ${this.label}`, { list: this.label });
    }
  }
}
