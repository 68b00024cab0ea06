/**
 * Keyword to SGR code tables
 */

/** Codes for {+Keyword} */
export const STYLE_ADD_CODES = Object.freeze({
  Reset: 0,
  Bold: 1,
  Dim: 2,
  Italic: 3,
  Underline: 4,
  Blinking: 5,
  Inverse: 7,
  Hidden: 8,
  Strikethrough: 9,
} as const);

/** Codes for {-Keyword}; Bold and Dim share normal intensity */
export const STYLE_REMOVE_CODES = Object.freeze({
  Bold: 22,
  Dim: 22,
  Italic: 23,
  Underline: 24,
  Blinking: 25,
  Inverse: 27,
  Hidden: 28,
  Strikethrough: 29,
} as const);

/** Codes for {#Name} */
export const COLOR_CODES = Object.freeze({
  BlackFg: 30,
  RedFg: 31,
  GreenFg: 32,
  YellowFg: 33,
  BlueFg: 34,
  MagentaFg: 35,
  CyanFg: 36,
  WhiteFg: 37,
  DefaultFg: 39,
  BlackBg: 40,
  RedBg: 41,
  GreenBg: 42,
  YellowBg: 43,
  BlueBg: 44,
  MagentaBg: 45,
  CyanBg: 46,
  WhiteBg: 47,
  DefaultBg: 49,
} as const);

export type AddStyle = keyof typeof STYLE_ADD_CODES;
export type RemoveStyle = keyof typeof STYLE_REMOVE_CODES;
export type ColorName = keyof typeof COLOR_CODES;

function lookup(
  table: Readonly<Record<string, number>>,
  key: string
): number | null {
  if (!Object.hasOwn(table, key)) {
    return null;
  }
  return table[key] ?? null;
}

export function lookupAddStyle(keyword: string): number | null {
  return lookup(STYLE_ADD_CODES, keyword);
}

export function lookupRemoveStyle(keyword: string): number | null {
  return lookup(STYLE_REMOVE_CODES, keyword);
}

export function lookupColor(name: string): number | null {
  return lookup(COLOR_CODES, name);
}
