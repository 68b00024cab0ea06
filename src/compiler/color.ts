/**
 * Color payload decoding for {#...} directives
 *
 * Accepted forms:
 * - Named:   RedFg, DefaultBg, ...
 * - Decimal: f(n) / b(n) for 256-color, f(r,g,b) / b(r,g,b) for truecolor
 * - Hex:     f[hh] / b[hh] for 256-color, f[rrggbb] / b[rrggbb] for truecolor
 */

import type { ColorLayer, ColorSpec } from '../types/template.js';
import {
  COLOR_MODE_INDEXED,
  COLOR_MODE_TRUECOLOR,
  EXTENDED_BG,
  EXTENDED_FG,
  MAX_SGR_CODE,
} from '../utils/constants.js';
import { lookupColor } from './tables.js';

const DECIMAL_PATTERN = /^[0-9]+$/;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

function parseLayer(prefix: string): ColorLayer | null {
  if (prefix === 'f') return 'fg';
  if (prefix === 'b') return 'bg';
  return null;
}

function parseDecimalComponent(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = parseInt(text, 10);
  return value <= MAX_SGR_CODE ? value : null;
}

function parseDecimal(layer: ColorLayer, body: string): ColorSpec | null {
  const parts: number[] = [];
  for (const part of body.split(',')) {
    const value = parseDecimalComponent(part);
    if (value === null) {
      return null;
    }
    parts.push(value);
  }

  const [first, second, third] = parts;
  if (parts.length === 1 && first !== undefined) {
    return { type: 'indexed', layer, index: first };
  }
  if (
    parts.length === 3 &&
    first !== undefined &&
    second !== undefined &&
    third !== undefined
  ) {
    return { type: 'truecolor', layer, red: first, green: second, blue: third };
  }
  return null;
}

function parseHex(layer: ColorLayer, body: string): ColorSpec | null {
  if (!HEX_PATTERN.test(body)) {
    return null;
  }

  const byteAt = (offset: number): number =>
    parseInt(body.slice(offset, offset + 2), 16);

  if (body.length === 2) {
    return { type: 'indexed', layer, index: byteAt(0) };
  }
  if (body.length === 6) {
    return {
      type: 'truecolor',
      layer,
      red: byteAt(0),
      green: byteAt(2),
      blue: byteAt(4),
    };
  }
  return null;
}

/**
 * Decode a color payload, returning null when it is malformed
 */
export function decodeColor(text: string): ColorSpec | null {
  const named = lookupColor(text);
  if (named !== null) {
    return { type: 'named', name: text, code: named };
  }

  const layer = parseLayer(text.charAt(0));
  if (layer === null || text.length < 3) {
    return null;
  }

  const open = text.charAt(1);
  const close = text.charAt(text.length - 1);
  const body = text.slice(2, -1);

  if (open === '(' && close === ')') {
    return parseDecimal(layer, body);
  }
  if (open === '[' && close === ']') {
    return parseHex(layer, body);
  }
  return null;
}

/**
 * SGR codes for a decoded color, in emission order
 */
export function colorCodes(spec: ColorSpec): number[] {
  if (spec.type === 'named') {
    return [spec.code];
  }

  const prefix = spec.layer === 'fg' ? EXTENDED_FG : EXTENDED_BG;
  if (spec.type === 'indexed') {
    return [prefix, COLOR_MODE_INDEXED, spec.index];
  }
  return [prefix, COLOR_MODE_TRUECOLOR, spec.red, spec.green, spec.blue];
}
