import { Lexer, LexerConfigError } from '../src/lexer/lexer';
import { Token, TokenType } from '../src/lexer/tokens';

describe('Lexer', () => {
  const lexer = new Lexer();

  function tokenValues(tokens: Iterable<Token>) {
    return Array.from(tokens).map(t => ({ type: t.type, raw: t.raw }));
  }

  function tokenTypes(source: string) {
    return lexer.tokenize(source).map(t => t.type);
  }

  describe('segmentation', () => {
    function segment(source: string): Token[] {
      return Array.from(lexer.segment(source));
    }

    it('should produce nothing for an empty source', () => {
      expect(segment('')).toEqual([]);
    });

    it('should merge a run of spaces and tabs into one token', () => {
      const tokens = segment(' \t  \t ');
      expect(tokenValues(tokens)).toEqual([
        { type: TokenType.SPACE, raw: ' \t  \t ' },
      ]);
    });

    it('should keep a comment up to the newline', () => {
      const tokens = segment('x // note\ny');
      expect(tokenValues(tokens)).toEqual([
        { type: TokenType.UNKNOWN, raw: 'x' },
        { type: TokenType.SPACE, raw: ' ' },
        { type: TokenType.COMMENT, raw: '// note' },
        { type: TokenType.NEWLINE, raw: '\n' },
        { type: TokenType.UNKNOWN, raw: 'y' },
      ]);
    });

    it('should run an unterminated comment to the end of input', () => {
      expect(tokenValues(segment('// This is a comment'))).toEqual([
        { type: TokenType.COMMENT, raw: '// This is a comment' },
      ]);
    });

    it('should keep string delimiters', () => {
      expect(tokenValues(segment('"Hello World"'))).toEqual([
        { type: TokenType.STRING, raw: '"Hello World"' },
      ]);
    });

    it('should swallow the rest of the source into an unterminated string', () => {
      expect(tokenValues(segment('"abc def\nnop'))).toEqual([
        { type: TokenType.STRING, raw: '"abc def\nnop' },
      ]);
    });

    it('should not split operators yet', () => {
      expect(tokenValues(segment('1+2'))).toEqual([
        { type: TokenType.UNKNOWN, raw: '1+2' },
      ]);
    });

    it('should treat a lone slash as part of an unknown run', () => {
      expect(tokenValues(segment('/b c'))).toEqual([
        { type: TokenType.UNKNOWN, raw: '/b' },
        { type: TokenType.SPACE, raw: ' ' },
        { type: TokenType.UNKNOWN, raw: 'c' },
      ]);
    });

    it('should track lines and columns', () => {
      const tokens = segment('a\n  bc');
      expect(tokens.map(t => [t.line, t.column])).toEqual([
        [1, 1],
        [1, 2],
        [2, 1],
        [2, 3],
      ]);
    });

    it('should count newlines inside strings', () => {
      const tokens = segment('"a\nb" c');
      expect(tokens[1]).toMatchObject({ type: TokenType.SPACE, line: 2, column: 3 });
      expect(tokens[2]).toMatchObject({ raw: 'c', line: 2, column: 4 });
    });

    it('should reconstruct the source from raw text', () => {
      const sources = [
        'fn main() {\n    nop\n}\n',
        '  // lead\n\t"str // not a comment" x+=y',
        '"unterminated\n  still string',
        'a//b -->> {}[]',
      ];
      for (const source of sources) {
        const joined = segment(source).map(t => t.raw).join('');
        expect(joined).toBe(source);
      }
    });
  });

  describe('operator extraction', () => {
    function extract(source: string) {
      return tokenValues(lexer.extractOperators(lexer.segment(source)));
    }

    it('should prefer the longest operator', () => {
      expect(extract('++')).toEqual([{ type: TokenType.INC, raw: '++' }]);
    });

    it('should fall back one character at a time', () => {
      expect(extract('+-')).toEqual([
        { type: TokenType.ADD, raw: '+' },
        { type: TokenType.SUB, raw: '-' },
      ]);
    });

    it('should match the longest spelling of the remainder', () => {
      expect(extract('<<<')).toEqual([
        { type: TokenType.LT, raw: '<' },
        { type: TokenType.LSHIFT, raw: '<<' },
      ]);
      expect(extract('-->')).toEqual([
        { type: TokenType.SUB, raw: '-' },
        { type: TokenType.ARROW, raw: '->' },
      ]);
    });

    it('should leave non-operator runs unknown', () => {
      const tokens = Array.from(lexer.extractOperators(lexer.segment('a<<=b')));
      expect(tokens.map(t => ({ type: t.type, raw: t.raw, column: t.column }))).toEqual([
        { type: TokenType.UNKNOWN, raw: 'a', column: 1 },
        { type: TokenType.LSHIFT, raw: '<<', column: 2 },
        { type: TokenType.UNKNOWN, raw: '=b', column: 4 },
      ]);
    });

    it('should pass strings through untouched', () => {
      expect(extract('"a+b"')).toEqual([{ type: TokenType.STRING, raw: '"a+b"' }]);
    });

    it('should fail on an operator character with no token type', () => {
      const broken = new Lexer('+@');
      expect(() => broken.tokenize('x@y')).toThrow(LexerConfigError);
      expect(() => broken.tokenize('x@y')).toThrow(
        "Lexer configuration error: operator character '@' has no token type",
      );
    });
  });

  describe('word identification', () => {
    it('should tag reserved words', () => {
      expect(tokenValues(lexer.tokens('fn print nop'))).toEqual([
        { type: TokenType.FN, raw: 'fn' },
        { type: TokenType.PRINT, raw: 'print' },
        { type: TokenType.NOP, raw: 'nop' },
      ]);
    });

    it('should tag everything else as a name, digits included', () => {
      expect(tokenValues(lexer.tokens('main fnx 42'))).toEqual([
        { type: TokenType.NAME, raw: 'main' },
        { type: TokenType.NAME, raw: 'fnx' },
        { type: TokenType.NAME, raw: '42' },
      ]);
    });
  });

  describe('noise removal', () => {
    it('should produce nothing for blank input', () => {
      expect(lexer.tokenize('')).toEqual([]);
      expect(lexer.tokenize('   ')).toEqual([]);
      expect(lexer.tokenize('\t \t')).toEqual([]);
    });

    it('should drop spaces, comments and newlines', () => {
      const types = tokenTypes('// header\nfn main() {\n\tnop // body\n}\n');
      expect(types).toEqual([
        TokenType.FN,
        TokenType.NAME,
        TokenType.LPARENTHESES,
        TokenType.RPARENTHESES,
        TokenType.LBRACE,
        TokenType.NOP,
        TokenType.RBRACE,
      ]);
    });

    it('should keep noise when asked', () => {
      expect(tokenValues(lexer.tokens('1 + 2', { keepNoise: true }))).toEqual([
        { type: TokenType.NAME, raw: '1' },
        { type: TokenType.SPACE, raw: ' ' },
        { type: TokenType.ADD, raw: '+' },
        { type: TokenType.SPACE, raw: ' ' },
        { type: TokenType.NAME, raw: '2' },
      ]);
    });
  });

  describe('full pipeline', () => {
    it('should split operators glued to operands', () => {
      expect(tokenValues(lexer.tokens('1+2'))).toEqual([
        { type: TokenType.NAME, raw: '1' },
        { type: TokenType.ADD, raw: '+' },
        { type: TokenType.NAME, raw: '2' },
      ]);
    });

    it('should tokenize an arithmetic line', () => {
      expect(tokenTypes('-1 + ~2 * +3 / 4 % 5')).toEqual([
        TokenType.SUB,
        TokenType.NAME,
        TokenType.ADD,
        TokenType.NEG,
        TokenType.NAME,
        TokenType.MUL,
        TokenType.ADD,
        TokenType.NAME,
        TokenType.DIV,
        TokenType.NAME,
        TokenType.MOD,
        TokenType.NAME,
      ]);
    });

    it('should tokenize a function head', () => {
      const tokens = lexer.tokenize('fn main() -> int');
      expect(tokenValues(tokens)).toEqual([
        { type: TokenType.FN, raw: 'fn' },
        { type: TokenType.NAME, raw: 'main' },
        { type: TokenType.LPARENTHESES, raw: '(' },
        { type: TokenType.RPARENTHESES, raw: ')' },
        { type: TokenType.ARROW, raw: '->' },
        { type: TokenType.NAME, raw: 'int' },
      ]);
      expect(tokens[3]).toMatchObject({ line: 1, column: 9 });
    });

    it('should count columns in code points around astral characters', () => {
      const tokens = lexer.tokenize('\u{1F600}+x y', { keepNoise: true });
      expect(tokens.map(t => [t.raw, t.column])).toEqual([
        ['\u{1F600}', 1],
        ['+', 2],
        ['x', 3],
        [' ', 4],
        ['y', 5],
      ]);
    });

    it('should produce tokens lazily', () => {
      const stream = lexer.tokens('nop fn');
      expect(stream.next().value).toMatchObject({ type: TokenType.NOP });
      expect(stream.next().value).toMatchObject({ type: TokenType.FN });
      expect(stream.next().done).toBe(true);
    });
  });
});
