import { z } from 'zod';
import { DxfError, DxfErrorCode } from '../errors/types';
import { LOG_LEVELS, LogLevel, setLogLevel } from '../logging/logLevelConfig';
import { DxfVersion, VersionContext, parseVersion } from '../dxf/version';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const versionField = z.union([z.nativeEnum(DxfVersion), z.string()]).transform((value, ctx) => {
  const version = typeof value === 'number' ? value : parseVersion(value);
  if (version === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported DXF version: ${value}` });
    return z.NEVER;
  }
  return version;
});

const envSchema = z.object({
  DXF_VERSION: z.string().default('AC1015').pipe(versionField),
  DXF_STRICT: flag,
  DXF_LARGE_GRAPHICS_SIZE: flag,
  LOG_LEVEL: z
    .string()
    .transform(value => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional()
});

const contextSchema = z.object({
  version: versionField,
  strict: z.boolean().default(false),
  largeGraphicsDataSize: z.boolean().default(false)
});

export type VersionContextOptions = z.input<typeof contextSchema>;

export interface EngineConfig {
  version: DxfVersion;
  strict: boolean;
  largeGraphicsDataSize: boolean;
  logLevel?: LogLevel;
}

function configError(error: z.ZodError): DxfError {
  const issues = error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
  return new DxfError(`Invalid engine configuration: ${issues.join('; ')}`, DxfErrorCode.INVALID_CONFIG, undefined, {
    issues
  });
}

/**
 * Read engine settings from the environment. A LOG_LEVEL, when present, becomes the global log level.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw configError(parsed.error);
  const config: EngineConfig = {
    version: parsed.data.DXF_VERSION,
    strict: parsed.data.DXF_STRICT,
    largeGraphicsDataSize: parsed.data.DXF_LARGE_GRAPHICS_SIZE,
    logLevel: parsed.data.LOG_LEVEL
  };
  if (config.logLevel) setLogLevel(config.logLevel);
  return config;
}

/**
 * Validated, frozen context for one input or output stream
 */
export function createVersionContext(options: VersionContextOptions): VersionContext {
  const parsed = contextSchema.safeParse(options);
  if (!parsed.success) throw configError(parsed.error);
  return Object.freeze({ ...parsed.data });
}
