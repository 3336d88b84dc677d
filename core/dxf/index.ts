export * from './version';
export * from './types';
export * from './group-codes';
export * from './io/line-source';
export * from './io/line-sink';
export * from './io/tag-reader';
export * from './io/tag-writer';
export * from './descriptors/builders';
export * from './descriptors/common';
export * from './descriptors/field-cursor';
export * from './ownership/owned-list';
export * from './ownership/entity';
export * from './ownership/list-manager';
export * from './ownership/entity-chain';
export * from './assembler';
export * from './serializer';
export * from './registry';
export * from './entity-stream';
export * from './entities';
