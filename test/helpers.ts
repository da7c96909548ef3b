import {mkdtemp, mkdir, rm, writeFile} from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {Rasterizer} from '../src/types.js';

export const ICON = '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 24 24"><path fill="black" stroke="black" d="M2 2h20v20H2z"/></svg>';

export async function tempRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'icon-tint-'));
}

export async function cleanup(dir: string) {
  await rm(dir, { recursive: true, force: true });
}

export async function writeIcons(root: string, files: Record<string, string>) {
  for (const [rel, body] of Object.entries(files)) {
    const full = path.join(root, rel);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, body);
  }
}

export type RasterCall = { svgPath: string; width: number; height: number; outPath: string };

/** Writes "WxH" instead of a PNG so tests can read back the requested size. */
export function fakeRasterizer(calls: RasterCall[] = []): Rasterizer {
  return async (svgPath, width, height, outPath) => {
    calls.push({ svgPath, width, height, outPath });
    await writeFile(outPath, `${width}x${height}`);
  };
}
