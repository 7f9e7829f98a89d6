import { registerAs } from '@nestjs/config';
import { dirname, join } from 'path';
import { existsSync } from 'fs';

/**
 * Directory holding the nearest package.json above `start`, or the
 * working directory when there is none.
 */
export function findProjectRoot(start: string = __dirname): string {
  let root = start;

  while (root !== dirname(root)) {
    if (existsSync(join(root, 'package.json'))) {
      return root;
    }
    root = dirname(root);
  }

  return process.cwd();
}

/**
 * Path Configuration
 *
 * Resolves the project root directory once and makes it available
 * through ConfigService as `paths.projectRoot`.
 */
export default registerAs('paths', () => ({
  projectRoot: findProjectRoot(),
}));
