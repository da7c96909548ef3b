import {assertHex, complementColor, isBright, resolveColor} from './colors.js';
import {exportIcons} from './exporter.js';
import {recolorSvgs} from './recolor.js';
import {Reporter} from './reporter.js';
import {TARGETS} from './targets.js';
import {GenerateOptions, GenerationSummary, Platform, Rasterizer} from './types.js';
import {Workspace} from './workspace.js';

export type PipelineDeps = {
  rasterize: Rasterizer;
  reporter?: Reporter; // omitted: run silently
};

const PLATFORM_LABEL: Record<Platform, string> = { ios: 'iOS', android: 'Android' };

export async function generateIcons(opts: GenerateOptions, deps: PipelineDeps): Promise<GenerationSummary> {
  const { rasterize, reporter } = deps;

  // Both colors resolve before anything on disk is touched.
  const fill = assertHex(resolveColor(opts.fillColor));
  const stroke = assertHex(resolveColor(opts.strokeColor));
  const complementary = complementColor(fill);

  reporter?.colorSelected(opts.fillColor, fill, complementary, isBright(opts.fillColor));
  reporter?.info(`Running on directory: ${opts.root}`);

  const ws = Workspace.forRoot(opts.root, opts.sourceDirName, opts.outputDirName);
  await ws.reset();
  await ws.populate();
  const recolored = await recolorSvgs(ws.svgDir, fill, stroke);

  const files: Record<Platform, string[]> = { ios: [], android: [] };
  const outDirs: Record<Platform, string> = { ios: ws.iosDir, android: ws.androidDir };

  for (const platform of ['ios', 'android'] as const) {
    reporter?.info(`Creating ${PLATFORM_LABEL[platform]} images please wait...`);
    files[platform] = await exportIcons({
      platform,
      svgDir: ws.svgDir,
      outDir: outDirs[platform],
      targets: TARGETS[platform],
      rasterize,
      onProgress: reporter && ((e) => reporter.progress(e)),
    });
    reporter?.done();
  }

  const icons = files.ios.length / TARGETS.ios.length;
  return { fill, stroke, complementary, icons, recolored, outputDir: ws.paths.output, files };
}
