/**
 * Brace group parsing and rendering
 *
 * Group forms, after the opening brace:
 * - {{                 literal {
 * - {}                 literal {} (plain placeholder)
 * - {name}             plain placeholder, passed through verbatim
 * - {+Bold-Dim#RedFg}  chain of style/color directives
 * - {+Bold&name-Dim}   & splits the chain around a placeholder
 * - {name+Bold}        chain followed by the placeholder {name}
 */

import { createSgrBuilder } from '../output/builder.js';
import type { BraceGroup, Directive } from '../types/template.js';
import { colorCodes, decodeColor } from './color.js';
import type { Cursor } from './cursor.js';
import { TemplateError } from './errors.js';
import { lookupAddStyle, lookupRemoveStyle } from './tables.js';

/** Symbols that start a directive inside a group */
export type DirectiveSymbol = '+' | '-' | '#' | '&';

/**
 * What ended a scan for the next delimiter
 * - directive: one of + - # &, starting another directive
 * - end: the closing brace
 */
export type Delimiter =
  | { kind: 'directive'; symbol: DirectiveSymbol; position: number }
  | { kind: 'end'; position: number };

function isStyleSymbol(ch: string): ch is '+' | '-' | '#' {
  return ch === '+' || ch === '-' || ch === '#';
}

function isDirectiveSymbol(ch: string): ch is DirectiveSymbol {
  return isStyleSymbol(ch) || ch === '&';
}

/**
 * Advance past the next delimiter, returning it
 * Returns null when the input ends first
 */
export function findDelimiter(cursor: Cursor): Delimiter | null {
  while (!cursor.done) {
    const position = cursor.position;
    const ch = cursor.next();
    if (ch === '}') {
      return { kind: 'end', position };
    }
    if (isDirectiveSymbol(ch)) {
      return { kind: 'directive', symbol: ch, position };
    }
  }
  return null;
}

/**
 * Resolve the text following a directive symbol
 * `position` is where the text starts, for error reporting
 */
export function parseDirective(
  symbol: DirectiveSymbol,
  text: string,
  position: number
): Directive {
  switch (symbol) {
    case '+': {
      const code = lookupAddStyle(text);
      if (code === null) {
        throw TemplateError.invalidKeyword(text, position);
      }
      return { type: 'style-add', keyword: text, codes: [code] };
    }
    case '-': {
      const code = lookupRemoveStyle(text);
      if (code === null) {
        throw TemplateError.invalidKeyword(text, position);
      }
      return { type: 'style-remove', keyword: text, codes: [code] };
    }
    case '#': {
      const spec = decodeColor(text);
      if (spec === null) {
        throw TemplateError.invalidColor(text, position);
      }
      return { type: 'color', spec, codes: colorCodes(spec) };
    }
    case '&':
      return { type: 'passthrough', text };
  }
}

/**
 * Parse one brace group
 * The cursor must sit just after the opening brace at `open`
 */
export function parseGroup(cursor: Cursor, open: number): BraceGroup {
  const first = cursor.peek();

  if (cursor.done) {
    throw TemplateError.missingCloseBracket(open);
  }
  if (first === '{') {
    cursor.next();
    return { type: 'literal', text: '{' };
  }
  if (first === '}') {
    cursor.next();
    return { type: 'literal', text: '{}' };
  }

  let name: string | null = null;
  let symbol: DirectiveSymbol;

  if (isStyleSymbol(first)) {
    cursor.next();
    symbol = first;
  } else {
    // The first character always belongs to the name, even '&'
    const nameStart = cursor.position;
    cursor.next();
    const delimiter = findDelimiter(cursor);
    if (delimiter === null) {
      throw TemplateError.missingCloseBracket(open);
    }
    name = cursor.slice(nameStart, delimiter.position);
    if (delimiter.kind === 'end') {
      return { type: 'literal', text: `{${name}}` };
    }
    symbol = delimiter.symbol;
  }

  const directives: Directive[] = [];
  for (;;) {
    const textStart = cursor.position;
    const delimiter = findDelimiter(cursor);
    if (delimiter === null) {
      throw TemplateError.missingCloseBracket(open);
    }
    const text = cursor.slice(textStart, delimiter.position);
    directives.push(parseDirective(symbol, text, textStart));
    if (delimiter.kind === 'end') {
      break;
    }
    symbol = delimiter.symbol;
  }

  return { type: 'chain', name, directives };
}

/**
 * Render a parsed group to output text
 *
 * Codes accumulate into one sequence; a passthrough flushes the pending
 * codes before its {fragment} and later codes open a new sequence.
 */
export function renderGroup(group: BraceGroup): string {
  if (group.type === 'literal') {
    return group.text;
  }

  const builder = createSgrBuilder();
  let output = '';

  for (const directive of group.directives) {
    if (directive.type === 'passthrough') {
      output += `${builder.flush()}{${directive.text}}`;
    } else {
      builder.writeCodes(directive.codes);
    }
  }

  output += builder.flush();
  if (group.name !== null) {
    output += `{${group.name}}`;
  }
  return output;
}
