import path from 'path';
import { convertedPathFor } from './converter';
import type { FileMapping } from './types';

// Copied and converted in this order.
export const SYNCED_FILE_NAMES = ['spec3', 'spec3.sdk', 'fixtures3', 'fixtures3.sdk'] as const;

export const OPENAPI_SUBDIR = 'openapi';

export function buildFileMappings(sourceDir: string, targetDir: string): FileMapping[] {
  return SYNCED_FILE_NAMES.map(name => {
    const targetPath = path.join(targetDir, OPENAPI_SUBDIR, `${name}.yaml`);
    return {
      name,
      sourcePath: path.join(sourceDir, OPENAPI_SUBDIR, `${name}.yaml`),
      targetPath,
      convertedPath: convertedPathFor(targetPath),
    };
  });
}
