import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, point, scalar } from '../descriptors/builders';
import { EXTRUSION_DEFAULT, ORIGIN, entityHeader, entityHeaderDefaults } from '../descriptors/common';

export const pointTable: DescriptorTable = {
  kind: 'POINT',
  fields: [
    ...entityHeader(),
    marker('AcDbPoint'),
    scalar('thickness', 39, 'double'),
    point('location', 10, { required: true }),
    point('extrusion', 210, { minVersion: DxfVersion.R12 }),
    scalar('xAxisAngle', 50, 'double')
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    thickness: 0,
    location: { ...ORIGIN },
    extrusion: { ...EXTRUSION_DEFAULT },
    xAxisAngle: 0
  })
};
