import {readFile, writeFile} from 'node:fs/promises';
import {findSvgs} from './discovery.js';
import {IOError} from './errors.js';
import {Hex} from './types.js';

// Literal text rewrite, not SVG-aware: fill='black' or style="fill:black" stay as they are.
export function recolorText(svg: string, fill: Hex, stroke: Hex): string {
  return svg
    .split('fill="black"').join(`fill="${fill}"`)
    .split('stroke="black"').join(`stroke="${stroke}"`);
}

/** Rewrites every SVG under `dir` in place; returns how many files changed. */
export async function recolorSvgs(dir: string, fill: Hex, stroke: Hex): Promise<number> {
  let changed = 0;
  for (const file of await findSvgs(dir)) {
    let src: string;
    try { src = await readFile(file, 'utf8'); }
    catch (e) { throw new IOError(file, 'read', e); }

    const out = recolorText(src, fill, stroke);
    if (out === src) continue;

    try { await writeFile(file, out, 'utf8'); }
    catch (e) { throw new IOError(file, 'write', e); }
    changed++;
  }
  return changed;
}
