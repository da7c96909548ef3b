import type {Dirent} from 'node:fs';
import {readdir, stat} from 'node:fs/promises';
import path from 'node:path';
import {IOError} from './errors.js';

/** Every `*.svg` below `dir`, depth first, sorted by path. */
export async function findSvgs(dir: string): Promise<string[]> {
  const found: string[] = [];
  let entries: Dirent[];
  try { entries = await readdir(dir, { withFileTypes: true }); }
  catch (e) { throw new IOError(dir, 'list', e); }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) found.push(...await findSvgs(full));
    else if (entry.name.endsWith('.svg') && (entry.isFile() || (entry.isSymbolicLink() && await isFileTarget(full)))) found.push(full);
  }
  return found.sort();
}

// dangling links are skipped
async function isFileTarget(link: string): Promise<boolean> {
  try { return (await stat(link)).isFile(); }
  catch { return false; }
}

export function baseNameFor(svgPath: string, svgRoot: string): string {
  const rel = path.relative(svgRoot, svgPath);
  const segments = rel.split(path.sep);
  const base = path.basename(rel).replace(/\.svg$/, '').replace(/-/g, '_');
  return segments.slice(0, -1).includes('filled') ? `filled_${base}` : base;
}
