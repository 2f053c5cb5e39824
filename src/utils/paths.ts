import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';

function getPackageRoot(): string {
  // Walk up to package.json so this works from both src/utils/ and dist/src/utils/
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Cannot locate package root from ${fileURLToPath(import.meta.url)}`);
    }
    dir = parent;
  }
  return dir;
}

export function getDefaultTablePath(): string {
  return resolve(getPackageRoot(), 'data', 'versions.json5');
}
