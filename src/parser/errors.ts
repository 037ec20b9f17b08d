import { Token } from '../lexer/tokens';

export type ParseErrorType = 'UnexpectedToken' | 'UnexpectedEnd' | 'Unsupported';

export class ParseError extends Error {
  constructor(
    public readonly errorType: ParseErrorType,
    message: string,
    public readonly token?: Token,
  ) {
    const where = token
      ? `line ${token.line}, column ${token.column}`
      : 'end of input';
    super(`Parse error at ${where}: ${message}`);
    this.name = 'ParseError';
  }
}
