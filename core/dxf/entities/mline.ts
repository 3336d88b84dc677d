import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, member, point, repeated, scalar } from '../descriptors/builders';
import { EXTRUSION_DEFAULT, ORIGIN, entityHeader, entityHeaderDefaults } from '../descriptors/common';

export const mlineTable: DescriptorTable = {
  kind: 'MLINE',
  minVersion: DxfVersion.R13,
  fields: [
    ...entityHeader(),
    marker('AcDbMline'),
    scalar('styleName', 2, 'string', { required: true }),
    scalar('style', 340, 'string'),
    scalar('scale', 40, 'double'),
    scalar('justification', 70, 'integer', { range: { min: 0, max: 2 } }),
    scalar('flags', 71, 'integer'),
    scalar('vertexCount', 72, 'integer', { countOf: 'vertices', required: true }),
    scalar('elementCount', 73, 'integer'),
    point('start', 10, { required: true }),
    point('extrusion', 210),
    repeated('vertices', [member('x', 11), member('y', 21), member('z', 31)])
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    styleName: 'STANDARD',
    style: '',
    scale: 1,
    justification: 0,
    flags: 0,
    vertexCount: 0,
    elementCount: 0,
    start: { ...ORIGIN },
    extrusion: { ...EXTRUSION_DEFAULT }
  })
};
