import {Platform, RasterTarget} from './types.js';

const flat = (label: string, size: number, suffix: string): RasterTarget =>
  ({ label, size, dir: '', fileName: (base) => `${base}${suffix}.png` });

const bucket = (dir: string, size: number): RasterTarget =>
  ({ label: dir, size, dir, fileName: (base) => `${base}.png` });

export const IOS_TARGETS: readonly RasterTarget[] = [
  flat('1x', 24, ''),
  flat('2x', 48, '@2x'),
  flat('3x', 72, '@3x'),
];

// hdpi (48) is smaller than plain drawable (60); the shipped asset set uses these sizes.
export const ANDROID_TARGETS: readonly RasterTarget[] = [
  bucket('drawable', 60),
  bucket('drawable-hdpi', 48),
  bucket('drawable-xhdpi', 64),
  bucket('drawable-xxhdpi', 96),
  bucket('drawable-xxxhdpi', 128),
];

export const TARGETS: Record<Platform, readonly RasterTarget[]> = {
  ios: IOS_TARGETS,
  android: ANDROID_TARGETS,
};
