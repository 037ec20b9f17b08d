import {
  Token,
  TokenType,
  KEYWORDS,
  NOISE,
  OPERATORS,
  OPERATOR_CHARS,
  createToken,
} from './tokens';

export interface LexOptions {
  /** Skip the noise-removal stage, keeping spaces, comments and newlines. */
  keepNoise?: boolean;
}

/**
 * Raised when an operator character has no one-character token type.
 * This is a broken operator table, never a problem with the source.
 */
export class LexerConfigError extends Error {
  constructor(public readonly char: string) {
    super(`Lexer configuration error: operator character '${char}' has no token type`);
    this.name = 'LexerConfigError';
  }
}

/**
 * Turns source text into a lazy token stream in four stages:
 *
 *   segment → extractOperators → identifyWords → removeNoise
 *
 * Every stage is a generator over the previous one, so the parser only pays
 * for the tokens it pulls. A stream is single-use; call `tokens()` again to
 * restart. The lexer keeps no per-source state and never throws on input.
 */
export class Lexer {
  private readonly operatorChars: ReadonlySet<string>;

  constructor(operatorChars: string = OPERATOR_CHARS) {
    this.operatorChars = new Set(operatorChars);
  }

  tokens(source: string, options: LexOptions = {}): Generator<Token, void, undefined> {
    const words = this.identifyWords(this.extractOperators(this.segment(source)));
    return options.keepNoise ? words : this.removeNoise(words);
  }

  tokenize(source: string, options: LexOptions = {}): Token[] {
    return Array.from(this.tokens(source, options));
  }

  // ─── Stage 1: segmentation ─────────────────────────────

  /**
   * Splits the source into newlines, comments, blank runs, strings and
   * unknown runs. The raw text of the output concatenates back to the source.
   */
  *segment(source: string): Generator<Token, void, undefined> {
    let pos = 0;
    let line = 1;
    let column = 1;

    while (pos < source.length) {
      const ch = source[pos];
      let end: number;
      let type: TokenType;

      if (ch === '\n') {
        end = pos + 1;
        type = TokenType.NEWLINE;
      } else if (ch === '/' && source[pos + 1] === '/') {
        const newline = source.indexOf('\n', pos);
        end = newline === -1 ? source.length : newline;
        type = TokenType.COMMENT;
      } else if (this.isBlank(ch)) {
        end = pos + 1;
        while (end < source.length && this.isBlank(source[end])) end++;
        type = TokenType.SPACE;
      } else if (ch === '"') {
        // Unterminated strings run to the end of input
        const close = source.indexOf('"', pos + 1);
        end = close === -1 ? source.length : close + 1;
        type = TokenType.STRING;
      } else {
        end = pos + 1;
        while (end < source.length && !this.isSeparator(source[end])) end++;
        type = TokenType.UNKNOWN;
      }

      const raw = source.slice(pos, end);
      yield createToken(type, raw, line, column);

      for (const c of raw) {
        if (c === '\n') {
          line++;
          column = 1;
        } else {
          column++;
        }
      }
      pos = end;
    }
  }

  // ─── Stage 2: operator extraction ──────────────────────

  *extractOperators(tokens: Iterable<Token>): Generator<Token, void, undefined> {
    for (const token of tokens) {
      if (token.type !== TokenType.UNKNOWN) {
        yield token;
        continue;
      }

      const raw = token.raw;
      let runStart = 0;
      for (let i = 1; i <= raw.length; i++) {
        const inOperator = this.isOperatorChar(raw[runStart]);
        if (i < raw.length && this.isOperatorChar(raw[i]) === inOperator) continue;

        const run = raw.slice(runStart, i);
        // Unknown runs never contain a newline; columns count code points, as in segment()
        const column = token.column + Array.from(raw.slice(0, runStart)).length;
        if (inOperator) {
          yield* this.matchOperators(run, token.line, column);
        } else {
          yield createToken(TokenType.UNKNOWN, run, token.line, column);
        }
        runStart = i;
      }
    }
  }

  /**
   * Longest match over a run of operator characters: take the whole rest of
   * the run when it is a known spelling, otherwise peel one character off.
   */
  private *matchOperators(run: string, line: number, column: number): Generator<Token, void, undefined> {
    let offset = 0;
    while (offset < run.length) {
      const rest = run.slice(offset);
      const whole = OPERATORS.get(rest);
      if (whole !== undefined) {
        yield createToken(whole, rest, line, column + offset);
        return;
      }

      const first = rest[0];
      const single = OPERATORS.get(first);
      if (single === undefined) {
        throw new LexerConfigError(first);
      }
      yield createToken(single, first, line, column + offset);
      offset++;
    }
  }

  // ─── Stage 3: word identification ──────────────────────

  *identifyWords(tokens: Iterable<Token>): Generator<Token, void, undefined> {
    for (const token of tokens) {
      if (token.type !== TokenType.UNKNOWN) {
        yield token;
        continue;
      }
      const keyword = KEYWORDS.get(token.raw);
      yield createToken(keyword ?? TokenType.NAME, token.raw, token.line, token.column);
    }
  }

  // ─── Stage 4: noise removal ────────────────────────────

  *removeNoise(tokens: Iterable<Token>): Generator<Token, void, undefined> {
    for (const token of tokens) {
      if (!NOISE.has(token.type)) yield token;
    }
  }

  private isBlank(ch: string): boolean {
    return ch === ' ' || ch === '\t';
  }

  private isSeparator(ch: string): boolean {
    return this.isBlank(ch) || ch === '\n';
  }

  private isOperatorChar(ch: string): boolean {
    return this.operatorChars.has(ch);
  }
}
