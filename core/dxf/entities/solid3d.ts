import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, member, repeated, scalar } from '../descriptors/builders';
import { entityHeader, entityHeaderDefaults } from '../descriptors/common';

/**
 * ACIS data arrives as 255-character chunks: group 1 lines, then group 3 overflow lines
 */
export const solid3dTable: DescriptorTable = {
  kind: '3DSOLID',
  minVersion: DxfVersion.R13,
  fields: [
    ...entityHeader(),
    marker('AcDbModelerGeometry'),
    scalar('modelerVersion', 70, 'integer', { required: true }),
    repeated('proprietaryData', [member('text', 1, 'string')]),
    repeated('additionalData', [member('text', 3, 'string')]),
    marker('AcDb3dSolid', { minVersion: DxfVersion.R2007 }),
    scalar('history', 350, 'string', { minVersion: DxfVersion.R2007 })
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    modelerVersion: 1,
    history: ''
  })
};
