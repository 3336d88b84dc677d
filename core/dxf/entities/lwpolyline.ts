import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, member, point, repeated, scalar } from '../descriptors/builders';
import { EXTRUSION_DEFAULT, entityHeader, entityHeaderDefaults } from '../descriptors/common';

export const LWPOLYLINE_CLOSED = 1;
export const LWPOLYLINE_PLINEGEN = 128;

/**
 * Vertices open on group 10; widths and bulge follow Y and are written only when nonzero
 */
export const lwpolylineTable: DescriptorTable = {
  kind: 'LWPOLYLINE',
  minVersion: DxfVersion.R14,
  fields: [
    ...entityHeader(),
    marker('AcDbPolyline'),
    scalar('vertexCount', 90, 'integer', { countOf: 'vertices', required: true }),
    scalar('flags', 70, 'integer'),
    scalar('constantWidth', 43, 'double'),
    scalar('thickness', 39, 'double'),
    repeated(
      'vertices',
      [
        member('x', 10),
        member('y', 20),
        member('startWidth', 40, 'double', { optional: true }),
        member('endWidth', 41, 'double', { optional: true }),
        member('bulge', 42, 'double', { optional: true })
      ],
      { openOn: 10 }
    ),
    point('extrusion', 210)
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    vertexCount: 0,
    flags: 0,
    constantWidth: 0,
    thickness: 0,
    extrusion: { ...EXTRUSION_DEFAULT }
  })
};
