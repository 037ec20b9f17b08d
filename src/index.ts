export { Lexer, LexOptions, LexerConfigError } from './lexer/lexer';
export {
  Token,
  TokenType,
  OPERATORS,
  OPERATOR_CHARS,
  KEYWORDS,
  createToken,
  displayToken,
} from './lexer/tokens';
export { Parser, ParserOptions } from './parser/parser';
export { AstNode, SerializedNode } from './parser/ast';
export { TokenCursor } from './parser/cursor';
export { ParseError, ParseErrorType } from './parser/errors';
export { loadConfig, loadConfigForSource, SpireConfig, AstFormat } from './config';

import { Lexer } from './lexer/lexer';
import { Parser, ParserOptions } from './parser/parser';
import { AstNode } from './parser/ast';

/**
 * Parse a Spire source string into its syntax tree. Throws a ParseError on
 * the first grammar violation.
 */
export function parse(source: string, options?: ParserOptions): AstNode {
  const lexer = new Lexer();
  const parser = new Parser(options);
  return parser.parse(lexer.tokens(source));
}
