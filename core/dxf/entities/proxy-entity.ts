import { DescriptorTable } from '../types';
import { DxfVersion, VersionThreshold } from '../version';
import { marker, member, repeated, scalar } from '../descriptors/builders';
import { entityHeader, entityHeaderDefaults } from '../descriptors/common';

export const PROXY_ENTITY_CLASS_ID = 498;
export const PROXY_APPLICATION_CLASS_ID = 500;

/**
 * Graphics size is group 92, or 160 where the writer is told sizes may exceed 32 bits
 */
export const proxyEntityTable: DescriptorTable = {
  kind: 'ACAD_PROXY_ENTITY',
  minVersion: DxfVersion.R13,
  fields: [
    ...entityHeader(),
    marker('AcDbProxyEntity'),
    scalar('proxyClassId', 90, 'integer', { required: true }),
    scalar('applicationClassId', 91, 'integer', { required: true }),
    scalar('graphicsDataSize', 92, 'integer', { altCode: 160, minVersion: VersionThreshold.GRAPHICS_DATA_SIZE }),
    repeated('graphicsData', [member('chunk', 310, 'string')]),
    scalar('entityDataSize', 93, 'integer'),
    repeated('softPointers', [member('handle', 330, 'string')]),
    repeated('hardPointers', [member('handle', 340, 'string')]),
    repeated('softOwners', [member('handle', 350, 'string')]),
    repeated('hardOwners', [member('handle', 360, 'string')]),
    scalar('objectDrawingFormat', 95, 'integer'),
    scalar('originalDataFormat', 70, 'integer', { allowed: [0, 1] })
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    proxyClassId: PROXY_ENTITY_CLASS_ID,
    applicationClassId: PROXY_APPLICATION_CLASS_ID,
    graphicsDataSize: 0,
    entityDataSize: 0,
    objectDrawingFormat: 0,
    originalDataFormat: 0
  })
};
