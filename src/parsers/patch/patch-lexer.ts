/**
 * patch-lexer.ts
 * Tokenizer for `module-info-patch.txt` files.
 *
 * Token kinds:
 *   word       - any run of characters other than whitespace and `{ } , ; /`
 *   lbrace     - `{`
 *   rbrace     - `}`
 *   comma      - `,`
 *   semicolon  - `;`
 *   symbol     - a lone `/` that does not open a comment
 *   eof        - end of input
 *
 * `//` line comments and `/* *\/` block comments are skipped. Every token
 * carries the line and column where it starts.
 */

import type { Origin } from '../../models/origin.js';
import { PatchSyntaxError } from './patch-syntax-error.js';

export type PatchTokenKind =
  | 'word'
  | 'lbrace'
  | 'rbrace'
  | 'comma'
  | 'semicolon'
  | 'symbol'
  | 'eof';

export interface PatchToken {
  kind: PatchTokenKind;
  /** Raw token text; empty for eof. */
  text: string;
  origin: Origin;
}

const PUNCTUATION: Record<string, PatchTokenKind> = {
  '{': 'lbrace',
  '}': 'rbrace',
  ',': 'comma',
  ';': 'semicolon',
};

const WORD_TERMINATORS = new Set(['{', '}', ',', ';', '/']);

export class PatchLexer {
  private readonly _source: string;
  private readonly _file: string | undefined;
  private _pos = 0;
  private _line = 1;
  private _column = 1;

  constructor(source: string, file?: string) {
    this._source = source;
    this._file = file;
  }

  /** Current position; after `next()` this is just past the returned token. */
  get origin(): Origin {
    return this._origin(this._line, this._column);
  }

  /** Read the next token. Returns an eof token forever once input is exhausted. */
  next(): PatchToken {
    this._skipTrivia();

    const line = this._line;
    const column = this._column;
    const ch = this._peek();

    if (ch === undefined) {
      return { kind: 'eof', text: '', origin: this._origin(line, column) };
    }

    const punctuation = PUNCTUATION[ch];
    if (punctuation !== undefined) {
      this._advance();
      return { kind: punctuation, text: ch, origin: this._origin(line, column) };
    }

    if (ch === '/') {
      this._advance();
      return { kind: 'symbol', text: ch, origin: this._origin(line, column) };
    }

    const start = this._pos;
    while (this._pos < this._source.length) {
      const c = this._source.charAt(this._pos);
      if (WORD_TERMINATORS.has(c) || isWhitespace(c)) break;
      this._advance();
    }
    return {
      kind: 'word',
      text: this._source.slice(start, this._pos),
      origin: this._origin(line, column),
    };
  }

  /** Tokenize the whole input, eof token included. */
  static tokenize(source: string, file?: string): PatchToken[] {
    const lexer = new PatchLexer(source, file);
    const tokens: PatchToken[] = [];
    for (;;) {
      const token = lexer.next();
      tokens.push(token);
      if (token.kind === 'eof') return tokens;
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _skipTrivia(): void {
    for (;;) {
      const ch = this._peek();
      if (ch === undefined) return;
      if (isWhitespace(ch)) {
        this._advance();
      } else if (ch === '/' && this._peek(1) === '/') {
        while (this._peek() !== undefined && this._peek() !== '\n' && this._peek() !== '\r') {
          this._advance();
        }
      } else if (ch === '/' && this._peek(1) === '*') {
        const origin = this.origin;
        this._advance();
        this._advance();
        for (;;) {
          const c = this._peek();
          if (c === undefined) {
            throw new PatchSyntaxError('Unterminated comment', origin);
          }
          if (c === '*' && this._peek(1) === '/') {
            this._advance();
            this._advance();
            break;
          }
          this._advance();
        }
      } else {
        return;
      }
    }
  }

  private _peek(offset = 0): string | undefined {
    const index = this._pos + offset;
    return index < this._source.length ? this._source.charAt(index) : undefined;
  }

  private _advance(): void {
    const ch = this._source.charAt(this._pos);
    this._pos++;
    if (ch === '\n' || (ch === '\r' && this._source.charAt(this._pos) !== '\n')) {
      this._line++;
      this._column = 1;
    } else if (ch !== '\r') {
      this._column++;
    }
  }

  private _origin(line: number, column: number): Origin {
    return this._file !== undefined ? { file: this._file, line, column } : { line, column };
  }
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f';
}
