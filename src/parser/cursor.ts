import { Token } from '../lexer/tokens';

/**
 * Pull handle on a token stream with a pushback stack. Unread tokens are
 * handed out again, most recent first, before anything new is pulled.
 */
export class TokenCursor {
  private readonly iterator: Iterator<Token, unknown, undefined>;
  private readonly pushback: Token[] = [];

  constructor(tokens: Iterable<Token>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  /** The next token, or undefined once the stream is exhausted. */
  next(): Token | undefined {
    const unread = this.pushback.pop();
    if (unread !== undefined) return unread;

    const result = this.iterator.next();
    return result.done ? undefined : result.value;
  }

  unread(token: Token): void {
    this.pushback.push(token);
  }
}
