export enum TokenType {
  // Structural
  ROOT = 'ROOT',
  UNKNOWN = 'UNKNOWN',
  NEWLINE = 'NEWLINE',
  COMMENT = 'COMMENT',

  // Layout (reserved, never produced)
  INDENT = 'INDENT',
  DEDENT = 'DEDENT',
  SPACE = 'SPACE',

  // Literals
  STRING = 'STRING',
  NAME = 'NAME',

  // Operators
  ADD = 'ADD',                   // +
  SUB = 'SUB',                   // -
  MUL = 'MUL',                   // *
  DIV = 'DIV',                   // /
  MOD = 'MOD',                   // %
  NEG = 'NEG',                   // ~
  INC = 'INC',                   // ++
  DEC = 'DEC',                   // --
  LT = 'LT',                     // <
  GT = 'GT',                     // >
  AND = 'AND',                   // &
  OR = 'OR',                     // |
  NOT = 'NOT',                   // !
  XOR = 'XOR',                   // ^
  LSHIFT = 'LSHIFT',             // <<
  RSHIFT = 'RSHIFT',             // >>
  ARROW = 'ARROW',               // ->

  // Delimiters
  LPARENTHESES = 'LPARENTHESES', // (
  RPARENTHESES = 'RPARENTHESES', // )
  LBRACE = 'LBRACE',             // {
  RBRACE = 'RBRACE',             // }
  LBRACKET = 'LBRACKET',         // [
  RBRACKET = 'RBRACKET',         // ]

  // Keywords
  FN = 'FN',
  PRINT = 'PRINT',
  NOP = 'NOP',
}

/** Characters that stage 2 splits out of unknown runs. */
export const OPERATOR_CHARS = '+-*/%<>&|!^~(){}[]';

export const OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['+', TokenType.ADD],
  ['-', TokenType.SUB],
  ['*', TokenType.MUL],
  ['/', TokenType.DIV],
  ['%', TokenType.MOD],
  ['~', TokenType.NEG],
  ['++', TokenType.INC],
  ['--', TokenType.DEC],
  ['<', TokenType.LT],
  ['>', TokenType.GT],
  ['&', TokenType.AND],
  ['|', TokenType.OR],
  ['!', TokenType.NOT],
  ['^', TokenType.XOR],
  ['<<', TokenType.LSHIFT],
  ['>>', TokenType.RSHIFT],
  ['->', TokenType.ARROW],
  ['(', TokenType.LPARENTHESES],
  [')', TokenType.RPARENTHESES],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  ['[', TokenType.LBRACKET],
  [']', TokenType.RBRACKET],
]);

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['fn', TokenType.FN],
  ['print', TokenType.PRINT],
  ['nop', TokenType.NOP],
]);

/** Tokens dropped by the last lexer stage. */
export const NOISE: ReadonlySet<TokenType> = new Set([
  TokenType.SPACE,
  TokenType.COMMENT,
  TokenType.NEWLINE,
]);

export interface Token {
  readonly type: TokenType;
  readonly raw: string;
  readonly line: number;
  readonly column: number;
}

export function createToken(type: TokenType, raw: string, line = 1, column = 1): Token {
  return { type, raw, line, column };
}

/** The synthetic token carried by a root node. */
export function rootToken(): Token {
  return createToken(TokenType.ROOT, '.');
}

/**
 * Text shown for a token in tree drawings. Layout tokens have no useful
 * spelling and print as a bracketed tag.
 */
export function displayToken(token: Token): string {
  switch (token.type) {
    case TokenType.SPACE:
    case TokenType.NEWLINE:
    case TokenType.INDENT:
    case TokenType.DEDENT:
      return `[${token.type}]`;
    default:
      return token.raw;
  }
}
