import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const SERVICE_NAME = 'generation-service';

function readPackageVersion(relative: string): string | undefined {
  try {
    const pkgPath = new URL(relative, import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // not found at this depth
  }
  return undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolved relative to this file, so it works from src/ (tsx, vitest) and
 * from dist/src/ (node).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion('../package.json') ??
  readPackageVersion('../../package.json') ??
  '0.0.0';
