export type Hex = string; // #RRGGBB

export type Platform = 'ios'|'android';

export type RasterTarget = {
  label: string; // '2x', 'drawable-hdpi', ...
  size: number; // square, px
  dir: string; // relative to the platform output dir, '' for flat
  fileName: (base: string) => string;
};

export type Rasterizer = (svgPath: string, width: number, height: number, outPath: string) => Promise<void>;

export type ProgressEvent = {
  platform: Platform;
  svgPath: string;
  baseName: string;
  index: number; // 1-based
  total: number;
};

export type ProgressObserver = (e: ProgressEvent) => void;

export type GenerateOptions = {
  fillColor: string;
  strokeColor: string;
  root: string; // project root holding svg/
  sourceDirName?: string; // default 'svg'
  outputDirName?: string; // default 'xamarin'
};

export type GenerationSummary = {
  fill: Hex;
  stroke: Hex;
  complementary: Hex;
  icons: number;
  recolored: number;
  outputDir: string;
  files: Record<Platform, string[]>;
};
