// Type-directed decoding of default values. The descriptor decides the
// scalar kind and the value count before any token is looked at.

import type { BaseType, ParameterValue, ScalarKind, TypeDescriptor } from '../types/oso.js';
import { OsoParseError } from './errors.js';
import type { Lexer, Token } from './lexer.js';
import type { StringTable } from './string-table.js';
import { componentCount, isInt32 } from './type-parser.js';

const BOOLEAN_WORDS: ReadonlyMap<string, number> = new Map([['true', 1], ['false', 0]]);

/** Scalar kind stored for a base type, or null when the type holds no literal values */
export function scalarKindOf(base: BaseType): ScalarKind | null {
  switch (base) {
    case 'int':
      return 'int';
    case 'string':
      return 'string';
    case 'float':
    case 'point':
    case 'vector':
    case 'normal':
    case 'color':
    case 'matrix':
      return 'float';
    default:
      return null;
  }
}

/** Value count a descriptor requires, or null for unsized arrays */
export function expectedArity(type: TypeDescriptor): number | null {
  const components = componentCount(type.base);
  if (type.arraySize === null) return components;
  return type.arraySize.kind === 'fixed' ? components * type.arraySize.length : null;
}

/** Element count of a parameter once its default (if any) is known */
export function resolvedArrayLength(type: TypeDescriptor, value?: ParameterValue): number | null {
  if (type.arraySize === null) return null;
  if (type.arraySize.kind === 'fixed') return type.arraySize.length;
  return value ? value.values.length / componentCount(type.base) : 0;
}

/** Literal tokens up to the next '%' or the end of the line */
export function collectValueTokens(lexer: Lexer): Token[] {
  const tokens: Token[] = [];
  while (!lexer.atLineEnd() && !lexer.hasNext('punctuation', '%')) {
    tokens.push(lexer.next());
  }
  return tokens;
}

function typeMismatch(token: Token, expected: string): OsoParseError {
  const found = token.kind === 'string' ? `"${token.text}"` : `'${token.text}'`;
  return new OsoParseError('TypeMismatch', token.line, `Expected ${expected}, found ${found}`);
}

function decodeInt(token: Token): number {
  if (token.kind === 'int') {
    const value = parseInt(token.text, 10);
    if (!isInt32(value)) throw typeMismatch(token, 'a 32-bit integer');
    return value;
  }
  const flag = token.kind === 'identifier' ? BOOLEAN_WORDS.get(token.text) : undefined;
  if (flag !== undefined) return flag;
  throw typeMismatch(token, 'an integer');
}

function decodeFloat(token: Token): number {
  if (token.kind === 'int' || token.kind === 'float') return Number(token.text);
  throw typeMismatch(token, 'a number');
}

function decodeString(token: Token, strings: StringTable): string {
  if (token.kind === 'string') return strings.intern(token.text);
  throw typeMismatch(token, 'a quoted string');
}

/** Decode every token as the given scalar kind */
export function decodeValues(kind: ScalarKind, tokens: readonly Token[], strings: StringTable): ParameterValue {
  switch (kind) {
    case 'int':
      return { kind, values: tokens.map(decodeInt) };
    case 'float':
      return { kind, values: tokens.map(decodeFloat) };
    case 'string':
      return { kind, values: tokens.map(t => decodeString(t, strings)) };
  }
}

/** Throw ArityMismatch unless `count` values fit the descriptor */
export function checkArity(type: TypeDescriptor, count: number, line: number): void {
  const expected = expectedArity(type);
  if (expected === null) {
    const components = componentCount(type.base);
    if (count % components !== 0) {
      throw new OsoParseError('ArityMismatch', line,
        `Expected a multiple of ${components} values for ${type.base}[], found ${count}`);
    }
  } else if (count !== expected) {
    throw new OsoParseError('ArityMismatch', line, `Expected ${expected} values, found ${count}`);
  }
}

/**
 * Decode the default written after a parameter name.
 * Returns undefined when the line carries no value tokens at all.
 */
export function decodeDefault(
  type: TypeDescriptor,
  tokens: readonly Token[],
  strings: StringTable,
): ParameterValue | undefined {
  if (tokens.length === 0) return undefined;
  const first = tokens[0];

  if (type.isClosure) {
    throw new OsoParseError('TypeMismatch', first.line, 'Closure parameters cannot carry a default');
  }
  const kind = scalarKindOf(type.base);
  if (kind === null) {
    throw new OsoParseError('TypeMismatch', first.line, `Type '${type.base}' cannot carry a default`);
  }

  checkArity(type, tokens.length, first.line);
  return decodeValues(kind, tokens, strings);
}
