// Hint decoding. A '%' introduces either a metadata entry or one of the
// compiler's annotations:
//
//   %string label "Diffuse"        inline metadata, values run to the next '%'
//   %meta{float[2],range,0,1}      braced metadata
//   %space{"world"}                coordinate space of the parameter
//   %struct{"Light"}               struct name, struct parameters only
//   %structfields{pos,intensity}   struct field names, struct parameters only
//   %initexpr                      default is computed by init code
//   %read{…} %write{…} %derivs     instruction-level annotations, skipped

import type { BaseType, Metadata, TypeDescriptor } from '../types/oso.js';
import { OsoParseError } from './errors.js';
import type { Lexer, Token } from './lexer.js';
import type { StringTable } from './string-table.js';
import { expectMore, isNameToken, parseBaseType, parseTypeDescriptor, scalarType } from './type-parser.js';
import { checkArity, collectValueTokens, decodeValues, scalarKindOf } from './value-decoder.js';

/** Parameter-only state that hints can change */
export interface ParameterHints {
  type: TypeDescriptor;
  space?: string;
  structFields: string[];
  /** Set by %initexpr: the written default is not the real one */
  initExpr: boolean;
}

/** The declaration a hint attaches to */
export interface HintTarget {
  readonly metadata: Metadata[];
  /** Null when hints apply to the shader itself */
  readonly param: ParameterHints | null;
}

/** Bare hints that carry nothing this parser records */
const IGNORED_BARE_HINTS: ReadonlySet<string> = new Set(['derivs']);

function expectPunctuation(lexer: Lexer, ch: string): void {
  const token = expectMore(lexer, `'${ch}'`);
  if (token.kind !== 'punctuation' || token.text !== ch) {
    throw new OsoParseError('UnexpectedDeclaration', token.line, `Expected '${ch}', found '${token.text}'`);
  }
  lexer.next();
}

function expectName(lexer: Lexer, what: string): Token {
  const token = expectMore(lexer, what);
  if (!isNameToken(token)) {
    throw new OsoParseError('TypeMismatch', token.line, `Expected ${what}, found '${token.text}'`);
  }
  return lexer.next();
}

/**
 * Build a metadata entry. The value count is taken from the tokens present;
 * `declaredLength` (from a braced `type[N]`) pins it when given.
 */
function buildMetadata(
  base: BaseType,
  keyToken: Token,
  tokens: readonly Token[],
  declaredLength: number | null,
  strings: StringTable,
): Metadata {
  const kind = scalarKindOf(base);
  if (kind === null) {
    throw new OsoParseError('TypeMismatch', keyToken.line, `Type '${base}' cannot be used for metadata`);
  }
  if (tokens.length === 0) {
    throw new OsoParseError('ArityMismatch', keyToken.line, `Metadata '${keyToken.text}' has no value`);
  }

  const collected: TypeDescriptor = {
    base,
    arraySize: declaredLength === null ? { kind: 'unsized' } : { kind: 'fixed', length: declaredLength },
    isClosure: false,
  };
  checkArity(collected, tokens.length, keyToken.line);

  return {
    key: strings.intern(keyToken.text),
    type: scalarType(base),
    value: decodeValues(kind, tokens, strings),
  };
}

function parseInlineMetadata(lexer: Lexer, strings: StringTable): Metadata {
  const base = parseBaseType(lexer.next().text);
  const keyToken = expectName(lexer, 'a metadata key');
  return buildMetadata(base, keyToken, collectValueTokens(lexer), null, strings);
}

function parseBracedMetadata(lexer: Lexer, strings: StringTable): Metadata {
  expectPunctuation(lexer, '{');
  const type = parseTypeDescriptor(lexer, strings);
  if (type.isClosure) {
    throw new OsoParseError('TypeMismatch', lexer.peek().line, 'Metadata cannot have a closure type');
  }
  expectPunctuation(lexer, ',');
  const keyToken = expectName(lexer, 'a metadata key');

  const tokens: Token[] = [];
  while (lexer.pollIf('punctuation', ',')) {
    const token = expectMore(lexer, 'a metadata value');
    if (token.kind === 'punctuation') {
      throw new OsoParseError('TypeMismatch', token.line, `Expected a metadata value, found '${token.text}'`);
    }
    tokens.push(lexer.next());
  }
  expectPunctuation(lexer, '}');

  const declaredLength = type.arraySize?.kind === 'fixed' ? type.arraySize.length : null;
  return buildMetadata(type.base, keyToken, tokens, declaredLength, strings);
}

/** Contents of a single-argument block such as {"world"} */
function parseBlockArgument(lexer: Lexer, strings: StringTable): string {
  expectPunctuation(lexer, '{');
  const token = expectMore(lexer, 'a hint argument');
  if (token.kind !== 'string' && !isNameToken(token)) {
    throw new OsoParseError('TypeMismatch', token.line, `Expected a name, found '${token.text}'`);
  }
  lexer.next();
  expectPunctuation(lexer, '}');
  return strings.intern(token.text);
}

function parseNameList(lexer: Lexer, strings: StringTable): string[] {
  expectPunctuation(lexer, '{');
  const names: string[] = [];
  if (lexer.pollIf('punctuation', '}')) return names;
  do {
    names.push(strings.intern(expectName(lexer, 'a field name').text));
  } while (lexer.pollIf('punctuation', ','));
  expectPunctuation(lexer, '}');
  return names;
}

/** Skip a balanced {…} block */
function skipBlock(lexer: Lexer): void {
  let depth = 0;
  do {
    const token = expectMore(lexer, "'}'");
    lexer.next();
    if (token.kind === 'punctuation' && token.text === '{') depth++;
    else if (token.kind === 'punctuation' && token.text === '}') depth--;
  } while (depth > 0);
}

/**
 * Decode one hint starting at a '%' token and apply it to `target`.
 * Braced hints are dispatched by name first, so `%struct{…}` is the struct
 * hint and never inline metadata of type struct.
 */
export function parseHint(lexer: Lexer, strings: StringTable, target: HintTarget): void {
  expectPunctuation(lexer, '%');
  const word = expectMore(lexer, "a hint after '%'");
  if (!isNameToken(word)) {
    throw new OsoParseError('UnknownType', word.line, `Expected a hint after '%', found '${word.text}'`);
  }

  const after = lexer.peek(1);
  const braced = after.kind === 'punctuation' && after.text === '{';
  if (!braced && parseBaseType(word.text) !== 'unknown') {
    target.metadata.push(parseInlineMetadata(lexer, strings));
    return;
  }

  lexer.next();
  const param = target.param;
  if (braced) {
    switch (word.text) {
      case 'meta':
        target.metadata.push(parseBracedMetadata(lexer, strings));
        return;
      case 'space': {
        const space = parseBlockArgument(lexer, strings);
        if (param) param.space = space;
        return;
      }
      case 'struct': {
        const structName = parseBlockArgument(lexer, strings);
        if (param?.type.base === 'struct') param.type = { ...param.type, structName };
        return;
      }
      case 'structfields': {
        const fields = parseNameList(lexer, strings);
        if (param?.type.base === 'struct') param.structFields = fields;
        return;
      }
      default:
        skipBlock(lexer);
        return;
    }
  }

  if (word.text === 'initexpr') {
    if (param) param.initExpr = true;
    return;
  }
  if (!IGNORED_BARE_HINTS.has(word.text)) {
    throw new OsoParseError('UnknownType', word.line, `Unknown hint or metadata type '${word.text}'`);
  }
}

/** Decode hints until the end of the line */
export function parseHints(lexer: Lexer, strings: StringTable, target: HintTarget): void {
  while (!lexer.atLineEnd()) {
    parseHint(lexer, strings, target);
  }
}
