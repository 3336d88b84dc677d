// Centralized debug flag system for module-specific verbose logging
// Flags come from process.env.DEBUG_FLAGS (e.g. DEBUG_FLAGS="TagReader,Assembler")
// In production, all debug flags are off and cannot be enabled

/**
 * Type for debug flag map
 */
export type DebugFlagMap = Record<string, boolean>;

const isProd = typeof process !== 'undefined' && process.env.NODE_ENV === 'production';

// Internal flag store
let debugFlags: DebugFlagMap = {};

function loadEnvFlags(): DebugFlagMap | undefined {
  if (typeof process !== 'undefined' && process.env.DEBUG_FLAGS) {
    const flags = process.env.DEBUG_FLAGS.split(',').map(f => f.trim()).filter(Boolean);
    const map: DebugFlagMap = {};
    for (const flag of flags) map[flag] = true;
    return map;
  }
  return undefined;
}

function initDebugFlags(): DebugFlagMap {
  if (isProd) return {};
  const envFlags = loadEnvFlags();
  if (envFlags) return { ...envFlags };
  return {};
}

debugFlags = initDebugFlags();

/**
 * Check if debug is enabled for a given module
 * @param module - The module name (e.g., 'TagReader')
 */
export function isDebugEnabled(module: string): boolean {
  if (isProd) return false;
  return !!debugFlags[module];
}

/**
 * Set debug flag for a module (dev only)
 */
export function setDebugFlag(module: string, enabled: boolean): void {
  if (isProd) return;
  debugFlags[module] = enabled;
}

/**
 * Reset flags to what the environment declares
 */
export function resetDebugFlags(): void {
  debugFlags = initDebugFlags();
}
