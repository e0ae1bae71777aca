import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface PackageInfo {
  version: string;
  description: string;
}

const manifestSchema = z.object({
  version: z.string(),
  description: z.string().default(''),
});

/** Finds the nearest package.json above this module, from src/ or dist/. */
export function getPackageInfo(startUrl: string = import.meta.url): PackageInfo {
  let dir = dirname(fileURLToPath(startUrl));

  while (true) {
    const manifest = readManifest(join(dir, 'package.json'));
    if (manifest) return manifest;

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { version: '0.0.0', description: '' };
}

function readManifest(path: string): PackageInfo | null {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
  const result = manifestSchema.safeParse(JSON.parse(content));
  return result.success ? result.data : null;
}
