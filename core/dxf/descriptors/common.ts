import { FieldDefaults, FieldDescriptor } from '../types';
import { VersionThreshold } from '../version';
import { marker, scalar } from './builders';

export const DEFAULT_LAYER = '0';
export const DEFAULT_LINETYPE = 'BYLAYER';
export const COLOR_BYLAYER = 256;
export const LINEWEIGHT_BYLAYER = -1;

/**
 * Handle plus the reactor and extension dictionary groups shared by entities and objects
 */
export function ownerFields(): FieldDescriptor[] {
  return [
    scalar('handle', 5, 'handle', { required: true }),
    scalar('softOwner', 330, 'string', { group: 'ACAD_REACTORS', minVersion: VersionThreshold.APPLICATION_GROUPS }),
    scalar('hardOwner', 360, 'string', { group: 'ACAD_XDICTIONARY', minVersion: VersionThreshold.APPLICATION_GROUPS })
  ];
}

export function ownerDefaults(): FieldDefaults {
  return { handle: 0, softOwner: '', hardOwner: '' };
}

/**
 * Common graphical entity header, up to and including the AcDbEntity subclass
 */
export function entityHeader(): FieldDescriptor[] {
  return [
    ...ownerFields(),
    marker('AcDbEntity'),
    scalar('paperspace', 67, 'integer', { allowed: [0, 1] }),
    scalar('layer', 8, 'string', { required: true }),
    scalar('linetype', 6, 'string'),
    scalar('elevation', 38, 'double', { maxVersion: VersionThreshold.ELEVATION_MAX }),
    scalar('color', 62, 'integer', { range: { min: 0, max: 256 } }),
    scalar('linetypeScale', 48, 'double'),
    scalar('visibility', 60, 'integer', { allowed: [0, 1] }),
    scalar('lineweight', 370, 'integer', { minVersion: VersionThreshold.LINEWEIGHT }),
    scalar('colorValue', 420, 'integer', { minVersion: VersionThreshold.TRUE_COLOR }),
    scalar('colorName', 430, 'string', { minVersion: VersionThreshold.TRUE_COLOR }),
    scalar('transparency', 440, 'integer', { minVersion: VersionThreshold.TRUE_COLOR }),
    scalar('material', 347, 'string', { minVersion: VersionThreshold.MATERIAL }),
    scalar('plotStyle', 390, 'string', { minVersion: VersionThreshold.PLOT_STYLE }),
    scalar('shadowMode', 284, 'integer', { minVersion: VersionThreshold.PLOT_STYLE, range: { min: 0, max: 3 } })
  ];
}

export function entityHeaderDefaults(): FieldDefaults {
  return {
    ...ownerDefaults(),
    paperspace: 0,
    layer: DEFAULT_LAYER,
    linetype: DEFAULT_LINETYPE,
    elevation: 0,
    color: COLOR_BYLAYER,
    linetypeScale: 1,
    visibility: 0,
    lineweight: LINEWEIGHT_BYLAYER,
    colorValue: 0,
    colorName: '',
    transparency: 0,
    material: '',
    plotStyle: '',
    shadowMode: 0
  };
}

export const EXTRUSION_DEFAULT = { x: 0, y: 0, z: 1 };
export const ORIGIN = { x: 0, y: 0, z: 0 };
