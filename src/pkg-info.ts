import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const PkgInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

// Walks up so the same lookup works from src/ and from dist/src/.
function findPackageJson(startDir: string): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`package.json not found above ${startDir}`);
    }
    dir = parent;
  }
}

const packageJsonPath = findPackageJson(
  path.dirname(fileURLToPath(import.meta.url))
);

export const pkgInfo = PkgInfoSchema.parse(
  JSON.parse(readFileSync(packageJsonPath, 'utf-8'))
);
