/**
 * DXF format versions, keyed by the numeric part of their $ACADVER name.
 * R11 and R12 share AC1009.
 */
export enum DxfVersion {
  R10 = 1006,
  R12 = 1009,
  R13 = 1012,
  R14 = 1014,
  R2000 = 1015,
  R2004 = 1018,
  R2007 = 1021,
  R2009 = 1023,
  R2010 = 1024,
  R2013 = 1027
}

export const KNOWN_VERSIONS: readonly DxfVersion[] = [
  DxfVersion.R10,
  DxfVersion.R12,
  DxfVersion.R13,
  DxfVersion.R14,
  DxfVersion.R2000,
  DxfVersion.R2004,
  DxfVersion.R2007,
  DxfVersion.R2009,
  DxfVersion.R2010,
  DxfVersion.R2013
];

const RELEASE_NAMES: Record<string, DxfVersion> = {
  R10: DxfVersion.R10,
  R11: DxfVersion.R12,
  R12: DxfVersion.R12,
  R13: DxfVersion.R13,
  R14: DxfVersion.R14,
  R2000: DxfVersion.R2000,
  R2004: DxfVersion.R2004,
  R2007: DxfVersion.R2007,
  R2009: DxfVersion.R2009,
  R2010: DxfVersion.R2010,
  R2013: DxfVersion.R2013
};

/**
 * Named version thresholds used by the descriptor tables and the serializer
 */
export const VersionThreshold = {
  /** Last version that writes elevation as group 38 */
  ELEVATION_MAX: DxfVersion.R12,
  SUBCLASS_MARKERS: DxfVersion.R13,
  APPLICATION_GROUPS: DxfVersion.R14,
  LINEWEIGHT: DxfVersion.R2000,
  GRAPHICS_DATA_SIZE: DxfVersion.R2000,
  TRUE_COLOR: DxfVersion.R2004,
  MATERIAL: DxfVersion.R2007,
  PLOT_STYLE: DxfVersion.R2009
} as const;

/**
 * Read-only state shared by every assembler and serializer call on one stream
 */
export interface VersionContext {
  readonly version: DxfVersion;
  readonly strict: boolean;
  /** Write the binary graphics data size as group 160 instead of 92 */
  readonly largeGraphicsDataSize: boolean;
}

/**
 * Parse an $ACADVER name (AC1015) or a release name (R2000)
 */
export function parseVersion(name: string): DxfVersion | undefined {
  const normalized = name.trim().toUpperCase();
  const acad = /^AC(\d{4})$/.exec(normalized);
  if (acad) {
    const numeric = Number(acad[1]);
    return KNOWN_VERSIONS.find(version => version === numeric);
  }
  return RELEASE_NAMES[normalized];
}

export function versionName(version: DxfVersion): string {
  return `AC${version}`;
}

export function isVersionInRange(version: DxfVersion, minVersion?: DxfVersion, maxVersion?: DxfVersion): boolean {
  if (minVersion !== undefined && version < minVersion) return false;
  if (maxVersion !== undefined && version > maxVersion) return false;
  return true;
}
