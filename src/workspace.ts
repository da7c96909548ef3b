import {existsSync} from 'node:fs';
import {cp, mkdir, rm, stat} from 'node:fs/promises';
import path from 'node:path';
import {IOError} from './errors.js';

export type WorkspacePaths = {
  source: string; // the source svg/ tree
  output: string; // scratch root, replaced every run
};

export async function ensureDir(dir: string): Promise<void> {
  try { await mkdir(dir, { recursive: true }); }
  catch (e) { throw new IOError(dir, 'create', e); }
}

export class Workspace {
  readonly svgDir: string;
  readonly iosDir: string;
  readonly androidDir: string;

  constructor(readonly paths: WorkspacePaths) {
    this.svgDir = path.join(paths.output, 'svg');
    this.iosDir = path.join(paths.output, 'ios');
    this.androidDir = path.join(paths.output, 'android');
  }

  static forRoot(root: string, sourceDirName = 'svg', outputDirName = 'xamarin'): Workspace {
    return new Workspace({ source: path.join(root, sourceDirName), output: path.join(root, outputDirName) });
  }

  async reset(): Promise<void> {
    if (!existsSync(this.paths.output)) return;
    try { await rm(this.paths.output, { recursive: true, force: true }); }
    catch (e) { throw new IOError(this.paths.output, 'remove', e); }
  }

  async populate(): Promise<void> {
    const { source } = this.paths;
    try {
      const s = await stat(source);
      if (!s.isDirectory()) throw new Error('not a directory');
    } catch (e) {
      throw new IOError(source, 'read source directory', e);
    }

    await ensureDir(this.paths.output);
    try { await cp(source, this.svgDir, { recursive: true, dereference: true }); }
    catch (e) { throw new IOError(this.svgDir, 'copy to', e); }
  }
}
