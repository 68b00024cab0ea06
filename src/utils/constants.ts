/**
 * Centralized constants for the template compiler
 * Replaces magic numbers with descriptive names
 */

// === SGR Framing ===
/** Escape character that starts every control sequence */
export const ESC = '\x1b';
/** Control Sequence Introducer: ESC followed by [ */
export const CSI = `${ESC}[`;
/** Final byte of a Select Graphic Rendition sequence */
export const SGR_END = 'm';
/** Separator between codes inside one sequence */
export const SGR_SEPARATOR = ';';
/** Largest value a single SGR parameter may take */
export const MAX_SGR_CODE = 255;

// === Color Prefixes ===
/** Extended foreground color introducer */
export const EXTENDED_FG = 38;
/** Extended background color introducer */
export const EXTENDED_BG = 48;
/** Extended color mode: 256-color palette index */
export const COLOR_MODE_INDEXED = 5;
/** Extended color mode: 24-bit RGB */
export const COLOR_MODE_TRUECOLOR = 2;

// === Escape Limits ===
/** Largest value accepted by a \xHH escape (7-bit) */
export const MAX_7BIT = 0x7f;
/** Largest Unicode scalar value */
export const MAX_UNICODE = 0x10ffff;
/** Maximum hex digits inside \u{...} */
export const MAX_UNICODE_DIGITS = 6;
/** First UTF-16 surrogate code point */
export const SURROGATE_START = 0xd800;
/** Last UTF-16 surrogate code point */
export const SURROGATE_END = 0xdfff;

// === Host Configuration ===
/** Project configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'sgr-template.json';
/** Default directory for compile logs */
export const DEFAULT_LOG_DIR = 'logs';

// === Exit Codes ===
/** Invalid usage or unexpected failure */
export const EXIT_USAGE = 1;
/** Template rejected by the compiler */
export const EXIT_COMPILE_ERROR = 2;

// === Size Thresholds ===
/** Threshold for displaying size in K (1000 chars) */
export const SIZE_THRESHOLD_K = 1000;
/** Threshold for displaying size in M (1000000 chars) */
export const SIZE_THRESHOLD_M = 1000000;

// === Display Limits ===
/** Truncation length for template previews in messages */
export const TRUNCATE_PREVIEW = 50;
