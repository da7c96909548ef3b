#!/usr/bin/env node
import {listColorNames} from './colors.js';
import {ConfigError, parseCliConfig, USAGE} from './config.js';
import {GenerationError, RasterizationError} from './errors.js';
import {generateIcons} from './pipeline.js';
import {createRasterizer} from './rasterizer.js';
import {Reporter} from './reporter.js';

export function exitCodeFor(e: unknown): number {
  if (e instanceof RasterizationError && e.exitCode) return e.exitCode;
  if (e instanceof ConfigError) return 2;
  return 1;
}

export async function main(argv: string[], reporter = new Reporter()): Promise<number> {
  try {
    const cfg = parseCliConfig(argv);
    if (cfg.help) { reporter.info(USAGE); return 0; }
    if (cfg.listColors) { listColorNames().forEach(n => reporter.info(n)); return 0; }

    reporter.banner();
    await generateIcons(
      { fillColor: cfg.fillColor, strokeColor: cfg.strokeColor, root: cfg.root },
      { rasterize: createRasterizer(cfg.converter, cfg.inkscapeBin), reporter },
    );
    return 0;
  } catch (e) {
    if (!(e instanceof GenerationError)) throw e;
    reporter.error(e.message);
    if (e instanceof ConfigError) reporter.info(USAGE);
    return exitCodeFor(e);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
