import { UnknownEntityKindError } from '../errors/types';
import { defaultLogger } from '../logging/DefaultLogger';
import { DescriptorTable } from './types';
import { defineTable } from './descriptors/builders';

const LOG_SOURCE = 'EntityRegistry';

/**
 * Process-wide map from entity kind to descriptor table
 */
export class EntityRegistry {
  private static instance: EntityRegistry;
  private readonly tables = new Map<string, DescriptorTable>();

  private constructor() {}

  public static getInstance(): EntityRegistry {
    if (!EntityRegistry.instance) {
      EntityRegistry.instance = new EntityRegistry();
    }
    return EntityRegistry.instance;
  }

  register(table: DescriptorTable): void {
    const kind = table.kind.toUpperCase();
    if (this.tables.has(kind)) {
      defaultLogger.debug(LOG_SOURCE, `Replacing descriptor table for ${kind}`);
    }
    this.tables.set(kind, defineTable(table));
  }

  unregister(kind: string): boolean {
    return this.tables.delete(kind.toUpperCase());
  }

  /**
   * @throws {UnknownEntityKindError} If no table is registered for the kind
   */
  get(kind: string): DescriptorTable {
    const table = this.find(kind);
    if (!table) throw new UnknownEntityKindError(kind);
    return table;
  }

  find(kind: string): DescriptorTable | undefined {
    return this.tables.get(kind.toUpperCase());
  }

  has(kind: string): boolean {
    return this.tables.has(kind.toUpperCase());
  }

  getRegisteredKinds(): string[] {
    return Array.from(this.tables.keys());
  }
}
