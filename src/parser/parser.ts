import { Token, TokenType } from '../lexer/tokens';
import { AstNode } from './ast';
import { TokenCursor } from './cursor';
import { ParseError } from './errors';

export interface ParserOptions {
  /** Print every grammar rule and unread as it happens. */
  trace?: boolean;
}

/**
 * Recursive-descent parser:
 *
 *   source    := block?              (stops before RBRACE or at end of input)
 *   block     := NOP | fn_stmt
 *   fn_stmt   := FN func_head scope
 *   func_head := NAME LPARENTHESES [func_args] RPARENTHESES [ARROW type_hint]
 *   scope     := LBRACE source RBRACE
 *
 * Tokens are pulled one at a time, so a lazy stream is never materialised.
 */
export class Parser {
  private cursor = new TokenCursor([]);
  private readonly traceEnabled: boolean;
  private traceLog: string[] = [];

  constructor(options: ParserOptions = {}) {
    this.traceEnabled = options.trace ?? false;
  }

  parse(tokens: Iterable<Token>): AstNode {
    this.cursor = new TokenCursor(tokens);
    this.traceLog = [];

    const root = this.parseSource();

    // A stray top-level RBRACE is unread by parseSource and rejected here too
    const trailing = this.cursor.next();
    if (trailing !== undefined) {
      throw this.unexpected(trailing, 'Expected end of input');
    }
    return root;
  }

  getTraceLog(): readonly string[] {
    return this.traceLog;
  }

  // ─── Statements ────────────────────────────────────────

  private parseSource(): AstNode {
    this.trace('source');
    const root = new AstNode();

    const tok = this.cursor.next();
    if (tok === undefined) return root;
    if (tok.type === TokenType.RBRACE) {
      // Closing brace belongs to the enclosing scope
      this.unread(tok);
      return root;
    }
    return root.append(this.parseBlock(tok));
  }

  private parseBlock(tok: Token): AstNode {
    switch (tok.type) {
      case TokenType.NOP:
        this.trace('nop');
        return new AstNode(tok);
      case TokenType.FN:
        return this.parseFuncStmt(tok);
      default:
        throw this.unexpected(tok, 'Expected a statement');
    }
  }

  private parseFuncStmt(fn: Token): AstNode {
    this.trace('fn_stmt');
    const node = new AstNode(fn);
    return node.append(this.parseFuncHead()).append(this.parseScope());
  }

  // ─── Functions ─────────────────────────────────────────

  private parseFuncHead(): AstNode {
    this.trace('func_head');
    const node = new AstNode(this.expect(TokenType.NAME, 'Expected function name'));
    this.expect(TokenType.LPARENTHESES);

    const tok = this.require(`Expected ${TokenType.RPARENTHESES}`);
    if (tok.type !== TokenType.RPARENTHESES) {
      node.append(this.parseFuncArgs(tok));
    }

    const next = this.cursor.next();
    if (next?.type === TokenType.ARROW) {
      node.append(this.parseTypeHint(next));
    } else if (next !== undefined) {
      this.unread(next);
    }
    return node;
  }

  private parseFuncArgs(tok: Token): AstNode {
    throw new ParseError('Unsupported', 'Function arguments are not supported yet', tok);
  }

  private parseTypeHint(arrow: Token): AstNode {
    throw new ParseError('Unsupported', 'Return type hints are not supported yet', arrow);
  }

  private parseScope(): AstNode {
    this.trace('scope');
    this.expect(TokenType.LBRACE);
    const body = this.parseSource();
    this.expect(TokenType.RBRACE);
    return body;
  }

  // ─── Helpers ───────────────────────────────────────────

  private require(expected: string): Token {
    const tok = this.cursor.next();
    if (tok === undefined) {
      throw new ParseError('UnexpectedEnd', `${expected} but input ended`);
    }
    return tok;
  }

  private expect(type: TokenType, expected = `Expected ${type}`): Token {
    const tok = this.require(expected);
    if (tok.type !== type) {
      throw this.unexpected(tok, expected);
    }
    return tok;
  }

  private unread(tok: Token): void {
    this.trace(`unread ${tok.type}`);
    this.cursor.unread(tok);
  }

  private unexpected(tok: Token, expected: string): ParseError {
    return new ParseError('UnexpectedToken', `${expected} but got ${tok.type} '${tok.raw}'`, tok);
  }

  private trace(message: string): void {
    this.traceLog.push(message);
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}
