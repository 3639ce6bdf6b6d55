// OSO lexer. Turns declaration text into tokens on demand, so nothing past
// the point where the parser stops is ever tokenized.

import { BASE_TYPE_NAMES } from '../types/oso.js';
import { OsoParseError } from './errors.js';

export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'string'
  | 'int'
  | 'float'
  | 'punctuation'
  | 'comment'
  | 'eol'
  | 'eof';

export const KEYWORDS = [
  'param', 'oparam', 'shader', 'closure',
  'local', 'temp', 'global', 'const', 'code',
  ...BASE_TYPE_NAMES,
] as const;

export type Keyword = typeof KEYWORDS[number];

export interface Token {
  readonly kind: TokenKind;
  /** Source text; for strings, the decoded contents without quotes */
  readonly text: string;
  /** 1-based */
  readonly line: number;
  /** 0-based */
  readonly col: number;
}

export interface LexerOptions {
  /** Emit `comment` tokens instead of dropping them */
  keepComments?: boolean;
}

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);
const PUNCTUATION = '[]{},%';
const IDENTIFIER_REGEX = /[A-Za-z_$][A-Za-z0-9_$.]*/y;
const NUMBER_REGEX = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_CHAR = /[A-Za-z0-9_$.]/;
const DIGIT = /[0-9]/;
const OCTAL_DIGIT = /[0-7]/;

const UTF8 = new TextDecoder('utf-8');
const HEX_DIGIT = /[0-9A-Fa-f]/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\',
};

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\v' || ch === '\f';
}

export function isKeyword(text: string): text is Keyword {
  return KEYWORD_SET.has(text);
}

export function decodeSource(source: string | Uint8Array): string {
  return typeof source === 'string' ? source : UTF8.decode(source);
}

/**
 * Lazy token source with arbitrary lookahead.
 *
 * `next`/`peek` pull tokens as the parser needs them; iterating the lexer
 * restarts from the beginning of the input and yields every token up to and
 * including `eof`.
 */
export class Lexer implements Iterable<Token> {
  private readonly src: string;
  private readonly keepComments: boolean;
  private readonly lookahead: Token[] = [];
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private atLineStart = true;

  constructor(source: string | Uint8Array, options: LexerOptions = {}) {
    this.src = decodeSource(source);
    this.keepComments = options.keepComments ?? false;
  }

  /** Rewind to the start of the input */
  reset(): void {
    this.lookahead.length = 0;
    this.pos = 0;
    this.line = 1;
    this.lineStart = 0;
    this.atLineStart = true;
  }

  *[Symbol.iterator](): Iterator<Token> {
    this.reset();
    for (;;) {
      const token = this.next();
      yield token;
      if (token.kind === 'eof') return;
    }
  }

  peek(offset = 0): Token {
    while (this.lookahead.length <= offset) {
      this.lookahead.push(this.scan());
    }
    return this.lookahead[offset];
  }

  next(): Token {
    return this.lookahead.shift() ?? this.scan();
  }

  hasNext(kind: TokenKind, text?: string): boolean {
    const token = this.peek();
    return token.kind === kind && (text === undefined || token.text === text);
  }

  /** Consume and return the next token when it matches, else leave it */
  pollIf(kind: TokenKind, text?: string): Token | undefined {
    return this.hasNext(kind, text) ? this.next() : undefined;
  }

  /** True when the current line has no tokens left */
  atLineEnd(): boolean {
    const kind = this.peek().kind;
    return kind === 'eol' || kind === 'eof';
  }

  /**
   * Discard the remainder of the current line, including its end-of-line,
   * without tokenizing anything not already looked at.
   */
  skipLine(): void {
    while (this.lookahead.length > 0) {
      const token = this.lookahead[0];
      if (token.kind === 'eof') return;
      this.lookahead.shift();
      if (token.kind === 'eol') return;
    }
    const end = this.src.indexOf('\n', this.pos);
    if (end < 0) {
      this.pos = this.src.length;
      return;
    }
    this.pos = end + 1;
    this.newLine();
  }

  // ── Scanning ───────────────────────────────────────────────────────────

  private newLine(): void {
    this.line++;
    this.lineStart = this.pos;
    this.atLineStart = true;
  }

  private token(kind: TokenKind, text: string, start: number): Token {
    return { kind, text, line: this.line, col: start - this.lineStart };
  }

  private fail(detail: string): never {
    throw new OsoParseError('MalformedToken', this.line, detail);
  }

  private scan(): Token {
    const src = this.src;
    for (;;) {
      if (this.atLineStart) {
        this.atLineStart = false;
        let i = this.pos;
        while (i < src.length && isBlank(src[i])) i++;
        if (src[i] === '#') {
          let end = src.indexOf('\n', i);
          if (end < 0) end = src.length;
          const comment = this.token('comment', src.slice(i, end).trimEnd(), i);
          this.pos = end;
          if (this.keepComments) return comment;
          continue;
        }
      }

      while (this.pos < src.length && isBlank(src[this.pos])) this.pos++;
      const start = this.pos;
      if (start >= src.length) return this.token('eof', '', start);

      const ch = src[start];
      if (ch === '\n') {
        const eol = this.token('eol', '\n', start);
        this.pos++;
        this.newLine();
        return eol;
      }
      if (ch === '"') return this.scanString();
      if (PUNCTUATION.includes(ch)) {
        this.pos++;
        return this.token('punctuation', ch, start);
      }
      if (this.startsNumber(start)) return this.scanNumber();

      IDENTIFIER_REGEX.lastIndex = start;
      const ident = IDENTIFIER_REGEX.exec(src);
      if (ident) {
        this.pos = start + ident[0].length;
        return this.token(isKeyword(ident[0]) ? 'keyword' : 'identifier', ident[0], start);
      }

      this.fail(`Unexpected character '${ch}'`);
    }
  }

  private startsNumber(i: number): boolean {
    const src = this.src;
    const at = (j: number): string => src[j] ?? '';
    if (DIGIT.test(at(i))) return true;
    if (at(i) === '.') return DIGIT.test(at(i + 1));
    if (at(i) === '+' || at(i) === '-') {
      return DIGIT.test(at(i + 1)) || (at(i + 1) === '.' && DIGIT.test(at(i + 2)));
    }
    return false;
  }

  private scanNumber(): Token {
    const src = this.src;
    const start = this.pos;
    NUMBER_REGEX.lastIndex = start;
    const match = NUMBER_REGEX.exec(src);
    if (!match) this.fail(`Malformed numeric literal at column ${start - this.lineStart}`);

    let end = start + match[0].length;
    if (end < src.length && IDENTIFIER_CHAR.test(src[end])) {
      while (end < src.length && IDENTIFIER_CHAR.test(src[end])) end++;
      this.fail(`Malformed numeric literal '${src.slice(start, end)}'`);
    }

    this.pos = end;
    return this.token(/[.eE]/.test(match[0]) ? 'float' : 'int', match[0], start);
  }

  private scanString(): Token {
    const src = this.src;
    const start = this.pos;
    let i = start + 1;
    let value = '';
    // Octal and hex escapes are raw bytes; consecutive ones decode together as UTF-8
    let bytes: number[] = [];
    const flushBytes = (): void => {
      if (bytes.length === 0) return;
      value += UTF8.decode(Uint8Array.from(bytes));
      bytes = [];
    };

    for (;;) {
      if (i >= src.length || src[i] === '\n') this.fail('Unterminated string literal');
      const ch = src[i];
      if (ch === '"') break;
      if (ch !== '\\') {
        flushBytes();
        value += ch;
        i++;
        continue;
      }

      const esc = src[i + 1];
      if (esc === undefined || esc === '\n') this.fail('Unterminated string literal');
      if (OCTAL_DIGIT.test(esc)) {
        let j = i + 1;
        while (j < i + 4 && j < src.length && OCTAL_DIGIT.test(src[j])) j++;
        bytes.push(parseInt(src.slice(i + 1, j), 8) & 0xff);
        i = j;
        continue;
      }
      if (esc === 'x' && HEX_DIGIT.test(src[i + 2] ?? '')) {
        let j = i + 2;
        while (j < i + 4 && j < src.length && HEX_DIGIT.test(src[j])) j++;
        bytes.push(parseInt(src.slice(i + 2, j), 16));
        i = j;
        continue;
      }

      flushBytes();
      if (esc in SIMPLE_ESCAPES) {
        value += SIMPLE_ESCAPES[esc];
      } else {
        // Unknown escapes stand for the escaped character
        value += esc;
      }
      i += 2;
    }
    flushBytes();

    this.pos = i + 1;
    return this.token('string', value, start);
  }
}
