// Declaration parser: a line-oriented state machine over the OSO header.
//
//   OpenShadingLanguage 1.12          version marker
//   shader surface "matte"            shader declaration
//   param float Kd 0.8 %meta{…}       parameters, each with optional hints
//   code ___main___                   start of the instruction section (not read)

import type {
  Metadata, Parameter, ParameterDirection, ParameterValue, ParseOptions, ShaderRecord, TypeDescriptor,
} from '../types/oso.js';
import { Logger } from '../logger.js';
import { OsoParseError } from './errors.js';
import { Lexer } from './lexer.js';
import type { Token } from './lexer.js';
import { parseHints } from './metadata-decoder.js';
import type { HintTarget, ParameterHints } from './metadata-decoder.js';
import { StringTable } from './string-table.js';
import { expectMore, isNameToken, parseTypeDescriptor } from './type-parser.js';
import { collectValueTokens, decodeDefault, resolvedArrayLength } from './value-decoder.js';

const log = new Logger('OsoParser');

const VERSION_MARKER = 'OpenShadingLanguage';

/** Shader types that may open a shader declaration without the `shader` keyword */
const SHADER_TYPE_WORDS: ReadonlySet<string> = new Set([
  'surface', 'displacement', 'volume', 'light', 'imager',
]);

/** Symbol declarations that carry nothing the query model exposes */
const SKIPPED_DECLARATIONS: ReadonlySet<string> = new Set(['local', 'temp', 'global', 'const']);

type ParserState = 'header' | 'shader' | 'parameters' | 'done';

interface ParameterBuilder {
  name: string;
  direction: ParameterDirection;
  default?: ParameterValue;
  hints: ParameterHints;
  target: HintTarget;
}

function unexpected(token: Token, detail: string): OsoParseError {
  return new OsoParseError('UnexpectedDeclaration', token.line, detail);
}

function describe(token: Token): string {
  return token.kind === 'string' ? `"${token.text}"` : `'${token.text}'`;
}

/**
 * Single-use parser for one OSO source. Fail-fast: the first error is thrown
 * and nothing built so far escapes.
 */
export class DeclarationParser {
  private readonly lexer: Lexer;
  private readonly strings = new StringTable();
  private readonly requireVersion: boolean;

  private state: ParserState = 'header';
  private version: string | null = null;
  private shaderName = '';
  private shaderType = '';
  private readonly shaderMetadata: Metadata[] = [];
  private readonly shaderTarget: HintTarget = { metadata: this.shaderMetadata, param: null };
  private readonly params: ParameterBuilder[] = [];
  private readonly names = new Set<string>();

  constructor(source: string | Uint8Array, options: ParseOptions = {}) {
    this.lexer = new Lexer(source);
    this.requireVersion = options.requireVersion ?? false;
  }

  parse(): ShaderRecord {
    if (this.state !== 'header') {
      throw new Error('DeclarationParser instances parse only once');
    }

    while (this.state !== 'done') {
      const token = this.lexer.peek();
      if (token.kind === 'eof') break;
      if (token.kind === 'eol' || token.kind === 'comment') {
        this.lexer.skipLine();
        continue;
      }
      this.parseLine(token);
    }

    if (this.state === 'header' || this.state === 'shader') {
      throw new OsoParseError('UnexpectedEndOfInput', this.lexer.peek().line,
        'Input ended before a shader declaration');
    }
    this.state = 'done';

    const record = this.build();
    log.debug(`Parsed ${record.shaderType} "${record.name}" (${record.parameters.length} parameters, ${this.strings.size} strings)`);
    return record;
  }

  // ── Line dispatch ──────────────────────────────────────────────────────────

  private parseLine(token: Token): void {
    switch (this.state) {
      case 'header':
        this.parseHeaderLine(token);
        return;
      case 'shader':
        this.parseShaderLine(token);
        return;
      case 'parameters':
        this.parseParameterSectionLine(token);
        return;
      case 'done':
        return;
    }
  }

  private parseHeaderLine(token: Token): void {
    if (token.kind === 'identifier' && token.text === VERSION_MARKER) {
      this.lexer.next();
      const parts: string[] = [expectMore(this.lexer, 'a version number').text];
      this.lexer.next();
      while (!this.lexer.atLineEnd()) parts.push(this.lexer.next().text);
      this.version = this.strings.intern(parts.join(' '));
      this.state = 'shader';
      this.endLine();
      return;
    }
    if (this.requireVersion) {
      throw unexpected(token, `Expected '${VERSION_MARKER}' version marker, found ${describe(token)}`);
    }
    this.state = 'shader';
    this.parseShaderLine(token);
  }

  private parseShaderLine(token: Token): void {
    if (token.kind === 'keyword' && (token.text === 'param' || token.text === 'oparam')) {
      throw unexpected(token, `Parameter declared before the shader declaration`);
    }

    if (token.kind === 'keyword' && token.text === 'shader') {
      this.lexer.next();
      const first = this.expectShaderName();
      if (this.lexer.atLineEnd() || this.lexer.hasNext('punctuation', '%')) {
        this.shaderType = this.strings.intern('shader');
        this.shaderName = this.strings.intern(first);
      } else {
        this.shaderType = this.strings.intern(first);
        this.shaderName = this.strings.intern(this.expectShaderName());
      }
    } else if (token.kind === 'identifier' && SHADER_TYPE_WORDS.has(token.text)) {
      this.lexer.next();
      this.shaderType = this.strings.intern(token.text);
      this.shaderName = this.strings.intern(this.expectShaderName());
    } else {
      throw unexpected(token, `Expected a shader declaration, found ${describe(token)}`);
    }

    parseHints(this.lexer, this.strings, this.shaderTarget);
    this.state = 'parameters';
    this.endLine();
  }

  private parseParameterSectionLine(token: Token): void {
    if (token.kind === 'keyword') {
      if (token.text === 'param' || token.text === 'oparam') {
        this.parseParameter();
        return;
      }
      if (token.text === 'code') {
        this.state = 'done';
        return;
      }
      if (token.text === 'shader') {
        throw unexpected(token, 'Second shader declaration');
      }
      if (SKIPPED_DECLARATIONS.has(token.text)) {
        this.lexer.skipLine();
        return;
      }
    }
    if (token.kind === 'identifier' && SHADER_TYPE_WORDS.has(token.text)) {
      throw unexpected(token, 'Second shader declaration');
    }
    if (token.kind === 'punctuation' && token.text === '%') {
      const last = this.params.at(-1);
      parseHints(this.lexer, this.strings, last ? last.target : this.shaderTarget);
      this.endLine();
      return;
    }
    throw unexpected(token, `Unexpected ${describe(token)} in parameter declarations`);
  }

  // ── Declarations ───────────────────────────────────────────────────────────

  private expectShaderName(): string {
    const token = expectMore(this.lexer, 'a shader name');
    if (token.kind !== 'string' && !isNameToken(token)) {
      throw unexpected(token, `Expected a shader name, found ${describe(token)}`);
    }
    this.lexer.next();
    return token.text;
  }

  private parseParameter(): void {
    const keyword = this.lexer.next();
    const direction: ParameterDirection = keyword.text === 'oparam' ? 'output' : 'input';
    const type = parseTypeDescriptor(this.lexer, this.strings);

    const nameToken = expectMore(this.lexer, 'a parameter name');
    if (!isNameToken(nameToken)) {
      throw unexpected(nameToken, `Expected a parameter name, found ${describe(nameToken)}`);
    }
    this.lexer.next();
    const name = this.strings.intern(nameToken.text);
    if (this.names.has(name)) {
      throw new OsoParseError('DuplicateParameterName', nameToken.line, `Duplicate parameter '${name}'`);
    }

    const valueTokens = collectValueTokens(this.lexer);
    if (direction === 'output' && valueTokens.length > 0) {
      throw unexpected(valueTokens[0], `Output parameter '${name}' cannot carry a default`);
    }

    const hints: ParameterHints = { type, structFields: [], initExpr: false };
    const builder: ParameterBuilder = {
      name,
      direction,
      default: decodeDefault(type, valueTokens, this.strings),
      hints,
      target: { metadata: [], param: hints },
    };
    parseHints(this.lexer, this.strings, builder.target);

    this.names.add(name);
    this.params.push(builder);
    this.endLine();
  }

  private endLine(): void {
    const token = this.lexer.peek();
    if (token.kind === 'eol') this.lexer.next();
    else if (token.kind !== 'eof') throw unexpected(token, `Unexpected ${describe(token)} at end of line`);
  }

  // ── Result ─────────────────────────────────────────────────────────────────

  private build(): ShaderRecord {
    const parameters = this.params.map(buildParameter);
    return Object.freeze({
      name: this.shaderName,
      shaderType: this.shaderType,
      version: this.version,
      parameters: Object.freeze(parameters),
      metadata: freezeMetadata(this.shaderMetadata),
    });
  }
}

function freezeMetadata(entries: readonly Metadata[]): readonly Metadata[] {
  return Object.freeze(entries.map(m => Object.freeze({
    key: m.key,
    type: freezeType(m.type),
    value: freezeValue(m.value),
  })));
}

function freezeType(type: TypeDescriptor): TypeDescriptor {
  return Object.freeze({
    ...type,
    arraySize: type.arraySize && Object.freeze({ ...type.arraySize }),
  });
}

function freezeValue(value: ParameterValue): ParameterValue {
  Object.freeze(value.values);
  return Object.freeze({ ...value });
}

function buildParameter(builder: ParameterBuilder): Parameter {
  const { hints } = builder;
  const value = hints.initExpr ? undefined : builder.default;

  const param: Parameter = {
    name: builder.name,
    type: freezeType(hints.type),
    direction: builder.direction,
    arrayLength: resolvedArrayLength(hints.type, value),
    metadata: freezeMetadata(builder.target.metadata),
    structFields: Object.freeze([...hints.structFields]),
  };
  if (value !== undefined) param.default = freezeValue(value);
  if (hints.space !== undefined) param.space = hints.space;
  return Object.freeze(param);
}

/** Parse OSO source text or bytes into a frozen ShaderRecord */
export function parseOso(source: string | Uint8Array, options: ParseOptions = {}): ShaderRecord {
  return new DeclarationParser(source, options).parse();
}
