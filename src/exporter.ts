import path from 'node:path';
import {baseNameFor, findSvgs} from './discovery.js';
import {Platform, ProgressObserver, RasterTarget, Rasterizer} from './types.js';
import {ensureDir} from './workspace.js';

export type ExportJob = {
  platform: Platform;
  svgDir: string; // recolored tree
  outDir: string; // platform root, e.g. xamarin/ios
  targets: readonly RasterTarget[];
  rasterize: Rasterizer;
  onProgress?: ProgressObserver;
};

// Icons and sizes run one at a time; the first failure stops the whole export.
export async function exportIcons(job: ExportJob): Promise<string[]> {
  const { platform, svgDir, outDir, targets, rasterize, onProgress } = job;
  for (const dir of new Set(targets.map(t => path.join(outDir, t.dir)))) await ensureDir(dir);

  const svgs = await findSvgs(svgDir);
  const written: string[] = [];

  for (const [i, svgPath] of svgs.entries()) {
    const baseName = baseNameFor(svgPath, svgDir);
    for (const t of targets) {
      const outPath = path.join(outDir, t.dir, t.fileName(baseName));
      await rasterize(svgPath, t.size, t.size, outPath);
      written.push(outPath);
    }
    onProgress?.({ platform, svgPath, baseName, index: i + 1, total: svgs.length });
  }
  return written;
}
