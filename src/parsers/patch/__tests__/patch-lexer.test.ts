/**
 * patch-lexer.test.ts
 * Token kinds, positions and comment handling of PatchLexer.
 */

import { PatchLexer } from '../patch-lexer.js';
import type { PatchToken } from '../patch-lexer.js';
import { PatchSyntaxError } from '../patch-syntax-error.js';

function summary(tokens: PatchToken[]): Array<[string, string, number, number]> {
  return tokens.map((t) => [t.kind, t.text, t.origin.line, t.origin.column]);
}

describe('PatchLexer', () => {
  it('reports kind, text, line and column of every token', () => {
    const tokens = PatchLexer.tokenize('patch-module a.b {\n  add-reads X; // trailing\n}');
    expect(summary(tokens)).toEqual([
      ['word', 'patch-module', 1, 1],
      ['word', 'a.b', 1, 14],
      ['lbrace', '{', 1, 18],
      ['word', 'add-reads', 2, 3],
      ['word', 'X', 2, 13],
      ['semicolon', ';', 2, 14],
      ['rbrace', '}', 3, 1],
      ['eof', '', 3, 2],
    ]);
  });

  it('splits words on punctuation without whitespace', () => {
    const kinds = PatchLexer.tokenize('A,B;').map((t) => t.kind);
    expect(kinds).toEqual(['word', 'comma', 'word', 'semicolon', 'eof']);
  });

  it('skips block comments spanning several lines', () => {
    const tokens = PatchLexer.tokenize('a /* x\n y */ b');
    expect(summary(tokens)).toEqual([
      ['word', 'a', 1, 1],
      ['word', 'b', 2, 7],
      ['eof', '', 2, 8],
    ]);
  });

  it('counts CRLF and lone CR as a single line break', () => {
    expect(PatchLexer.tokenize('a\r\nb')[1]?.origin).toEqual({ line: 2, column: 1 });
    expect(PatchLexer.tokenize('a\rb')[1]?.origin).toEqual({ line: 2, column: 1 });
  });

  it('returns a lone slash as a symbol token', () => {
    const tokens = PatchLexer.tokenize('a / b');
    expect(tokens[1]).toEqual({ kind: 'symbol', text: '/', origin: { line: 1, column: 3 } });
  });

  it('keeps returning eof once the input is exhausted', () => {
    const lexer = new PatchLexer('x');
    lexer.next();
    expect(lexer.next().kind).toBe('eof');
    expect(lexer.next().kind).toBe('eof');
  });

  it('attaches the file name to origins when given', () => {
    const [first] = PatchLexer.tokenize('x', '/p/module-info-patch.txt');
    expect(first?.origin).toEqual({ file: '/p/module-info-patch.txt', line: 1, column: 1 });
  });

  it('rejects an unterminated block comment at the comment start', () => {
    let error: unknown;
    try {
      PatchLexer.tokenize('a\n  /* never closed');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(PatchSyntaxError);
    if (!(error instanceof PatchSyntaxError)) return;
    expect(error.message).toBe('Unterminated comment (line 2)');
    expect(error.line).toBe(2);
    expect(error.column).toBe(3);
  });
});
