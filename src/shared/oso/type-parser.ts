// Type descriptor parsing: ['closure'] base ['[' [length] ']'], where base is
// a base-type keyword or 'struct' with an optional struct name.

import type { ArraySize, BaseType, TypeDescriptor } from '../types/oso.js';
import { BASE_TYPE_COMPONENTS, BASE_TYPE_NAMES } from '../types/oso.js';
import { OsoParseError } from './errors.js';
import type { Lexer, Token } from './lexer.js';
import type { StringTable } from './string-table.js';

const BASE_TYPE_BY_NAME: ReadonlyMap<string, BaseType> = new Map(
  BASE_TYPE_NAMES.map((name): [string, BaseType] => [name, name]),
);

/** Map a type word to its base type; anything else is 'unknown' */
export function parseBaseType(word: string): BaseType {
  return BASE_TYPE_BY_NAME.get(word) ?? 'unknown';
}

/** Components per array element (3 for colors and geometric types, 16 for matrices) */
export function componentCount(base: BaseType): number {
  return BASE_TYPE_COMPONENTS[base] ?? 1;
}

/** OSO ints are 32-bit signed */
export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff;
}

export function isNameToken(token: Token): boolean {
  return token.kind === 'identifier' || token.kind === 'keyword';
}

/** Throw UnexpectedEndOfInput if the current line has run out of tokens */
export function expectMore(lexer: Lexer, what: string): Token {
  const token = lexer.peek();
  if (token.kind === 'eol' || token.kind === 'eof') {
    throw new OsoParseError('UnexpectedEndOfInput', token.line, `Expected ${what} before end of line`);
  }
  return token;
}

function parseArraySuffix(lexer: Lexer): ArraySize | null {
  const open = lexer.pollIf('punctuation', '[');
  if (!open) return null;
  if (lexer.pollIf('punctuation', ']')) return { kind: 'unsized' };

  const lengthToken = expectMore(lexer, 'array length');
  lexer.next();
  const length = lengthToken.kind === 'int' ? parseInt(lengthToken.text, 10) : NaN;
  if (!isInt32(length) || lengthToken.text.startsWith('-')) {
    throw new OsoParseError('InvalidArraySize', lengthToken.line,
      `Invalid array size '${lengthToken.text}'`);
  }
  const close = expectMore(lexer, "']'");
  if (close.kind !== 'punctuation' || close.text !== ']') {
    throw new OsoParseError('InvalidArraySize', close.line,
      `Expected ']' after array size, found '${close.text}'`);
  }
  lexer.next();
  return { kind: 'fixed', length };
}

/**
 * Consume a type from the lexer.
 *
 * A `struct` may be followed by its name (`struct Light[2] lights`); the
 * name is only taken when another name or an array suffix follows it, so
 * `param struct s` still declares a parameter called `s`.
 */
export function parseTypeDescriptor(lexer: Lexer, strings: StringTable): TypeDescriptor {
  const isClosure = lexer.pollIf('keyword', 'closure') !== undefined;

  const typeToken = expectMore(lexer, 'a type name');
  const base = isNameToken(typeToken) ? parseBaseType(typeToken.text) : 'unknown';
  if (base === 'unknown') {
    throw new OsoParseError('UnknownType', typeToken.line, `Unknown type '${typeToken.text}'`);
  }
  lexer.next();

  let structName: string | undefined;
  if (base === 'struct' && isNameToken(lexer.peek())) {
    const after = lexer.peek(1);
    if (isNameToken(after) || (after.kind === 'punctuation' && after.text === '[')) {
      structName = strings.intern(lexer.next().text);
    }
  }

  const descriptor: TypeDescriptor = { base, arraySize: parseArraySuffix(lexer), isClosure };
  if (structName !== undefined) descriptor.structName = structName;
  return descriptor;
}

/** A scalar, non-closure descriptor of the given base type */
export function scalarType(base: BaseType): TypeDescriptor {
  return { base, arraySize: null, isClosure: false };
}
