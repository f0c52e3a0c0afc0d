import path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Returns the directory holding the per-format mapping files.
 * An explicit directory wins, then BIBCONVERT_MAPPING_DIR, then the bundled mappings/ directory.
 */
export function getMappingDir(explicitDir?: string): string {
  if (explicitDir) {
    return path.resolve(explicitDir);
  }
  const envPath = process.env.BIBCONVERT_MAPPING_DIR;
  if (envPath) {
    return path.resolve(envPath);
  }
  return fileURLToPath(new URL('../mappings/', import.meta.url));
}

export function isDebug(): boolean {
  return process.env.BIBCONVERT_DEBUG === 'true';
}

export function debug(scope: string, ...details: unknown[]): void {
  if (isDebug()) {
    console.error(`[${scope}]`, ...details);
  }
}
