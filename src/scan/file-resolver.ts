import fg from 'fast-glob';
import path from 'path';
import * as fs from 'fs';
import { ALLOWED_EXTS } from '../config/constants';

const DEFAULT_IGNORE = ['**/node_modules/**', '**/.git/**'];

/*
 * Expands CLI path arguments into absolute file paths. Directories are walked,
 * anything that does not exist is tried as a glob, and only .md, .txt and .mdx
 * files are kept. An explicitly named file is kept whatever its extension.
 */
export function resolveTargets(args: { cliArgs: string[]; cwd: string }): string[] {
  const { cliArgs, cwd } = args;

  const explicit = new Set<string>();
  const files: string[] = [];
  for (const arg of cliArgs) {
    const absArg = path.resolve(cwd, arg);
    if (fs.existsSync(absArg)) {
      const stat = fs.statSync(absArg);
      if (stat.isDirectory()) {
        const found = fg.sync(`${absArg.replace(/\\/g, '/')}/**/*`, { dot: false, onlyFiles: true, ignore: DEFAULT_IGNORE });
        files.push(...found);
      } else if (stat.isFile()) {
        explicit.add(absArg);
        files.push(absArg);
      }
    } else {
      // Try as glob
      const found = fg.sync(arg.replace(/\\/g, '/'), { cwd, absolute: true, dot: false, onlyFiles: true, ignore: DEFAULT_IGNORE });
      files.push(...found);
    }
  }

  const dedup = new Set<string>();
  for (const f of files) {
    const abs = path.resolve(f);
    const ext = path.extname(abs).toLowerCase();
    if (!explicit.has(abs) && !ALLOWED_EXTS.has(ext)) continue;
    dedup.add(abs);
  }
  return Array.from(dedup).sort();
}
