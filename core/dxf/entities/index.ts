import { DescriptorTable } from '../types';
import { EntityRegistry } from '../registry';
import { pointTable } from './point';
import { lineTable } from './line';
import { circleTable } from './circle';
import { arcTable } from './arc';
import { lwpolylineTable } from './lwpolyline';
import { imageTable } from './image';
import { mlineTable } from './mline';
import { solid3dTable } from './solid3d';
import { proxyEntityTable } from './proxy-entity';
import { dictionaryTable } from './dictionary';

export const BUILT_IN_TABLES: readonly DescriptorTable[] = [
  pointTable,
  lineTable,
  circleTable,
  arcTable,
  lwpolylineTable,
  imageTable,
  mlineTable,
  solid3dTable,
  proxyEntityTable,
  dictionaryTable
];

// Register all built-in kinds
for (const table of BUILT_IN_TABLES) {
  EntityRegistry.getInstance().register(table);
}

export * from './point';
export * from './line';
export * from './circle';
export * from './arc';
export * from './lwpolyline';
export * from './image';
export * from './mline';
export * from './solid3d';
export * from './proxy-entity';
export * from './dictionary';
