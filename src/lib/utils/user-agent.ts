import { readFileSync } from 'fs';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from `src/` and from `dist/src/`.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'qvs', version: '0.0.0-dev' };

  const candidates = [
    '../../../package.json', // from src/lib/utils/
    '../../../../package.json', // from dist/src/lib/utils/
  ];

  for (const rel of candidates) {
    try {
      const resolved = require.resolve(rel, { paths: [__dirname] });
      const raw: unknown = JSON.parse(readFileSync(resolved, 'utf-8'));
      if (typeof raw !== 'object' || raw === null) continue;
      cachedPkg = {
        name: 'name' in raw && typeof raw.name === 'string' ? raw.name : defaults.name,
        version: 'version' in raw && typeof raw.version === 'string' ? raw.version : defaults.version,
      };
      return cachedPkg;
    } catch {
      continue;
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build a standardized User-Agent string for outbound CMS/AAS HTTP calls */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
