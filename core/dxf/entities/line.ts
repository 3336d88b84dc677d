import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, point, scalar } from '../descriptors/builders';
import { EXTRUSION_DEFAULT, ORIGIN, entityHeader, entityHeaderDefaults } from '../descriptors/common';

export const lineTable: DescriptorTable = {
  kind: 'LINE',
  fields: [
    ...entityHeader(),
    marker('AcDbLine'),
    scalar('thickness', 39, 'double'),
    point('start', 10, { required: true }),
    point('end', 11, { required: true }),
    point('extrusion', 210, { minVersion: DxfVersion.R12 })
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    thickness: 0,
    start: { ...ORIGIN },
    end: { ...ORIGIN },
    extrusion: { ...EXTRUSION_DEFAULT }
  })
};
