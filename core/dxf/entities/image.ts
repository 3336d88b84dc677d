import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, member, point, repeated, scalar } from '../descriptors/builders';
import { ORIGIN, entityHeader, entityHeaderDefaults } from '../descriptors/common';

const PERCENT = { min: 0, max: 100 };

export const imageTable: DescriptorTable = {
  kind: 'IMAGE',
  minVersion: DxfVersion.R14,
  fields: [
    ...entityHeader(),
    marker('AcDbRasterImage'),
    scalar('classVersion', 90, 'integer', { required: true }),
    point('insertion', 10, { required: true }),
    point('uVector', 11, { required: true }),
    point('vVector', 12, { required: true }),
    point('size', 13, { dimensions: 2, required: true }),
    scalar('imageDef', 340, 'string', { required: true }),
    scalar('displayProperties', 70, 'integer', { required: true }),
    scalar('clippingState', 280, 'integer', { required: true, allowed: [0, 1] }),
    scalar('brightness', 281, 'integer', { required: true, range: PERCENT }),
    scalar('contrast', 282, 'integer', { required: true, range: PERCENT }),
    scalar('fade', 283, 'integer', { required: true, range: PERCENT }),
    scalar('imageDefReactor', 360, 'string', { required: true }),
    scalar('clipBoundaryType', 71, 'integer', { required: true, allowed: [1, 2] }),
    scalar('clipVertexCount', 91, 'integer', { countOf: 'clipVertices', required: true }),
    repeated('clipVertices', [member('x', 14), member('y', 24)])
  ],
  defaults: () => ({
    ...entityHeaderDefaults(),
    classVersion: 0,
    insertion: { ...ORIGIN },
    uVector: { x: 1, y: 0, z: 0 },
    vVector: { x: 0, y: 1, z: 0 },
    size: { ...ORIGIN },
    imageDef: '',
    displayProperties: 0,
    clippingState: 0,
    brightness: 50,
    contrast: 50,
    fade: 0,
    imageDefReactor: '',
    clipBoundaryType: 1,
    clipVertexCount: 0
  })
};
