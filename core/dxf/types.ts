import { DxfVersion } from './version';

/**
 * One group-code/value pair as it appears on the wire
 */
export interface DxfTag {
  code: number;
  value: string;
}

export interface Point3 {
  x: number;
  y: number;
  z: number;
}

export type FieldValue = string | number | Point3;

/**
 * Declared type of a field value.
 * `handle` is the entity id: hexadecimal on the wire, a number in memory.
 * Pointer handles (330, 340, 350, 360, 390) are declared as `string` and kept verbatim.
 */
export type ValueType = 'string' | 'double' | 'integer' | 'handle' | 'boolean';

export type ApplicationGroup = 'ACAD_REACTORS' | 'ACAD_XDICTIONARY';

interface VersionRange {
  minVersion?: DxfVersion;
  maxVersion?: DxfVersion;
}

interface DataDescriptorBase extends VersionRange {
  key: string;
  /** 102 application group wrapping the field */
  group?: ApplicationGroup;
}

export interface NumericRange {
  min: number;
  max: number;
}

export interface ScalarDescriptor extends DataDescriptorBase {
  kind: 'scalar';
  code: number;
  type: ValueType;
  /** Also accepted on read; written instead of `code` when largeGraphicsDataSize is set */
  altCode?: number;
  /** Key of the repeated field whose length this scalar declares */
  countOf?: string;
  required?: boolean;
  range?: NumericRange;
  allowed?: readonly number[];
}

export interface PointDescriptor extends DataDescriptorBase {
  kind: 'point';
  /** Code of X; Y and Z follow at +10 and +20 */
  code: number;
  dimensions: 2 | 3;
  required?: boolean;
}

export interface ListMember {
  key: string;
  code: number;
  type: ValueType;
  /** Left out on write while it holds the empty value */
  optional?: boolean;
}

export interface RepeatedDescriptor extends DataDescriptorBase {
  kind: 'repeated';
  members: readonly ListMember[];
  /** Member code that starts every node; nodes otherwise close on their last member */
  openOn?: number;
}

export interface MarkerDescriptor extends VersionRange {
  kind: 'marker';
  value: string;
}

export type DataDescriptor = ScalarDescriptor | PointDescriptor | RepeatedDescriptor;
export type FieldDescriptor = DataDescriptor | MarkerDescriptor;

export type ListNodeValue = Record<string, string | number>;

export type FieldDefaults = Record<string, FieldValue>;

/**
 * Declarative layout of one entity or object kind
 */
export interface DescriptorTable {
  kind: string;
  /** First version in which the kind exists */
  minVersion?: DxfVersion;
  /** Non-graphical objects (DICTIONARY) rather than entities */
  isObject?: boolean;
  /** Write order; group 0 is implied */
  fields: readonly FieldDescriptor[];
  /** Single source of default values for scalar and point fields */
  defaults(): FieldDefaults;
}

export function isPoint3(value: unknown): value is Point3 {
  return (
    typeof value === 'object' &&
    value !== null &&
    'x' in value &&
    'y' in value &&
    'z' in value &&
    typeof value.x === 'number' &&
    typeof value.y === 'number' &&
    typeof value.z === 'number'
  );
}

export function isDataDescriptor(descriptor: FieldDescriptor): descriptor is DataDescriptor {
  return descriptor.kind !== 'marker';
}
