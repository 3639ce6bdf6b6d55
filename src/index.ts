// Public API of the OSO query library

export * from './shared/types/index.js';
export { OsoParseError, IndexOutOfRangeError, isOsoParseError } from './shared/oso/errors.js';
export type { ParseErrorKind } from './shared/oso/errors.js';
export { Lexer } from './shared/oso/lexer.js';
export type { Token, TokenKind, LexerOptions } from './shared/oso/lexer.js';
export { DeclarationParser, parseOso } from './shared/oso/declaration-parser.js';
export { StringTable } from './shared/oso/string-table.js';
export { ShaderQuery, findMetadata, formatType } from './shared/shader-query.js';
export { Logger, LOG_LEVEL, setLogLevel, getLogLevel } from './shared/logger.js';
export type { LogLevel, LogLevelName } from './shared/logger.js';
export { FileManager } from './main/managers/file-manager.js';
export type { SearchPath } from './main/managers/file-manager.js';
