export {assertHex, complementColor, isBright, listColorNames, luma, resolveColor} from './colors.js';
export {baseNameFor, findSvgs} from './discovery.js';
export {GenerationError, InvalidColorError, IOError, RasterizationError} from './errors.js';
export {exportIcons} from './exporter.js';
export type {ExportJob} from './exporter.js';
export {generateIcons} from './pipeline.js';
export type {PipelineDeps} from './pipeline.js';
export {createRasterizer, inkscapeArgs, inkscapeRasterizer, sharpRasterizer} from './rasterizer.js';
export {recolorSvgs, recolorText} from './recolor.js';
export {Reporter} from './reporter.js';
export {ANDROID_TARGETS, IOS_TARGETS, TARGETS} from './targets.js';
export * from './types.js';
export {ensureDir, Workspace} from './workspace.js';
