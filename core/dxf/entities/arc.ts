import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, point, scalar } from '../descriptors/builders';
import { EXTRUSION_DEFAULT, ORIGIN, entityHeader, entityHeaderDefaults } from '../descriptors/common';

/**
 * ARC reuses the AcDbCircle layout and adds its angles in degrees
 */
export const arcTable: DescriptorTable = {
  kind: 'ARC',
  fields: [
    ...entityHeader(),
    marker('AcDbCircle'),
    scalar('thickness', 39, 'double'),
    point('center', 10, { required: true }),
    scalar('radius', 40, 'double', { required: true }),
    marker('AcDbArc'),
    scalar('startAngle', 50, 'double', { required: true }),
    scalar('endAngle', 51, 'double', { required: true }),
    point('extrusion', 210, { minVersion: DxfVersion.R12 })
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    thickness: 0,
    center: { ...ORIGIN },
    radius: 0,
    startAngle: 0,
    endAngle: 0,
    extrusion: { ...EXTRUSION_DEFAULT }
  })
};
