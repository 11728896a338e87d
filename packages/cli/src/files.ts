import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface ResolvedFiles {
  files: string[];
  /** Arguments that matched neither a file nor a directory */
  missing: string[];
}

/**
 * Expand path arguments into files; directories are walked recursively
 */
export async function resolveInputFiles(
  paths: string[],
  cwd: string = process.cwd(),
): Promise<ResolvedFiles> {
  const files: string[] = [];
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(resolved);
    } catch {
      missing.push(p);
      continue;
    }

    if (stats.isFile()) {
      files.push(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob('**/*', {
        cwd: resolved,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    }
  }

  return { files: [...new Set(files)], missing };
}
