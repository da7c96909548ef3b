import namedColors from '../data/named-colors.json';
import {InvalidColorError} from './errors.js';
import {Hex} from './types.js';

const NAMED_COLORS: Readonly<Record<string, Hex>> = namedColors;

export function listColorNames(): string[] {
  return Object.keys(NAMED_COLORS).sort();
}

// '#...' passes through untouched; only names are checked
export function resolveColor(color: string): Hex {
  if (color.startsWith('#')) return color;

  const hex = Object.prototype.hasOwnProperty.call(NAMED_COLORS, color) ? NAMED_COLORS[color] : undefined;
  if (hex === undefined) throw new InvalidColorError(color, listColorNames());
  return hex;
}

const HEX_RE = /^#[0-9A-Fa-f]{6}$/;

export function assertHex(hex: string): Hex {
  if (!HEX_RE.test(hex)) throw new InvalidColorError(hex, listColorNames(), 'expected #RRGGBB');
  return hex;
}

export function complementColor(hex: Hex): Hex {
  const n = parseInt(assertHex(hex).slice(1), 16);
  return '#' + ((0xFFFFFF ^ n) >>> 0).toString(16).toUpperCase().padStart(6, '0');
}

export function luma(hex: Hex): number {
  const h = assertHex(hex).slice(1);
  const r = parseInt(h.slice(0, 2), 16);
  const g = parseInt(h.slice(2, 4), 16);
  const b = parseInt(h.slice(4, 6), 16);
  return (r * 299 + g * 587 + b * 114) / 1000;
}

export function isBright(color: string): boolean {
  return luma(resolveColor(color)) > 155;
}
