import spawn from 'cross-spawn';
import sharp from 'sharp';
import {readFile} from 'node:fs/promises';
import {RasterizationError} from './errors.js';
import {Rasterizer} from './types.js';

export type SpawnResult = {
  status: number|null;
  stderr: string;
  error?: Error;
};

export type SpawnSync = (command: string, args: string[]) => SpawnResult;

export const crossSpawnSync: SpawnSync = (command, args) => {
  const res = spawn.sync(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
  return { status: res.status, stderr: res.stderr ? res.stderr.toString() : '', error: res.error };
};

export function inkscapeArgs(svgPath: string, width: number, height: number, outPath: string): string[] {
  return ['-w', String(width), '-h', String(height), svgPath, '-o', outPath];
}

/**
 * Shells out to inkscape (1.x CLI), one blocking process per size.
 * No timeout: a hung inkscape hangs the run.
 */
export function inkscapeRasterizer(opts: { bin?: string; spawnSync?: SpawnSync } = {}): Rasterizer {
  const bin = opts.bin ?? 'inkscape';
  const run = opts.spawnSync ?? crossSpawnSync;

  return async (svgPath, width, height, outPath) => {
    const res = run(bin, inkscapeArgs(svgPath, width, height, outPath));
    if (res.error) throw new RasterizationError(svgPath, outPath, res.status, res.stderr, res.error);
    if (res.status !== 0) throw new RasterizationError(svgPath, outPath, res.status, res.stderr);
  };
}

/** In-process alternative for machines without inkscape. */
export function sharpRasterizer(): Rasterizer {
  return async (svgPath, width, height, outPath) => {
    try {
      const svg = await readFile(svgPath);
      await sharp(svg).resize(width, height, { fit: 'fill' }).png().toFile(outPath);
    } catch (e) {
      throw new RasterizationError(svgPath, outPath, null, '', e);
    }
  };
}

export type ConverterName = 'inkscape'|'sharp';

export function createRasterizer(name: ConverterName, inkscapeBin?: string): Rasterizer {
  return name === 'sharp' ? sharpRasterizer() : inkscapeRasterizer({ bin: inkscapeBin });
}
