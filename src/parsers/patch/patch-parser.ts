/**
 * patch-parser.ts
 * Parses `module-info-patch.txt` content into a PatchDeclaration.
 *
 * Grammar (keywords are case-sensitive):
 *
 *   patch-file := "patch-module" module-name "{" directive* "}"
 *   directive  := "add-modules"   name-list ";"
 *               | "limit-modules" name-list ";"
 *               | "add-reads"     name-list ";"
 *               | "add-exports"   package-name "to" name-list ";"
 *               | "add-opens"     package-name "to" name-list ";"
 *   name-list  := name ("," name)*
 *
 * Parsing is strict: the first violation throws PatchSyntaxError. The parser
 * only checks syntax; giving meaning to the special keywords is the job of
 * ModulePatch.load.
 */

import type { Origin } from '../../models/origin.js';
import { PatchLexer } from './patch-lexer.js';
import type { PatchToken } from './patch-lexer.js';
import { PatchSyntaxError } from './patch-syntax-error.js';
import { isValidQualifiedName } from './identifiers.js';

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

/** Stands for every module contributed by test-scoped dependencies. */
export const TEST_MODULE_PATH = 'TEST-MODULE-PATH';
/** Understood by the compiler: the unnamed module (class path). */
export const ALL_UNNAMED = 'ALL-UNNAMED';
/** Understood by the compiler: every module on the module path. */
export const ALL_MODULE_PATH = 'ALL-MODULE-PATH';

export type ModuleListKeyword = 'add-modules' | 'limit-modules' | 'add-reads';
export type QualifiedKeyword = 'add-exports' | 'add-opens';
export type DirectiveKeyword = ModuleListKeyword | QualifiedKeyword;

/** Non-identifier values accepted in the name list of each directive. */
export const SPECIAL_CASES: Readonly<Record<DirectiveKeyword, ReadonlySet<string>>> = {
  'add-modules': new Set([ALL_MODULE_PATH, TEST_MODULE_PATH]),
  'limit-modules': new Set<string>(),
  'add-reads': new Set([TEST_MODULE_PATH]),
  'add-exports': new Set([ALL_UNNAMED, TEST_MODULE_PATH]),
  'add-opens': new Set<string>(),
};

// ---------------------------------------------------------------------------
// Parsed records
// ---------------------------------------------------------------------------

export interface ModuleListDirective {
  kind: ModuleListKeyword;
  /** Module names as written, special keywords included. */
  modules: string[];
  origin: Origin;
}

export interface QualifiedDirective {
  kind: QualifiedKeyword;
  packageName: string;
  targets: string[];
  origin: Origin;
}

export type PatchDirective = ModuleListDirective | QualifiedDirective;

export interface PatchDeclaration {
  moduleName: string;
  /** Directives in file order. */
  directives: PatchDirective[];
  origin: Origin;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export class PatchParser {
  private readonly _lexer: PatchLexer;
  private _token: PatchToken;

  private constructor(source: string, file?: string) {
    this._lexer = new PatchLexer(source, file);
    this._token = this._lexer.next();
  }

  /**
   * Parse a whole patch file.
   *
   * @param source - File content.
   * @param file   - File path, used in error messages only.
   */
  static parse(source: string, file?: string): PatchDeclaration {
    return new PatchParser(source, file)._parseFile();
  }

  private _parseFile(): PatchDeclaration {
    const origin = this._token.origin;
    this._expectWord('patch-module');
    const moduleName = this._name('module');
    this._expect('lbrace', '{');

    const directives: PatchDirective[] = [];
    while (this._token.kind === 'word') {
      directives.push(this._parseDirective());
    }

    this._expect('rbrace', '}');
    if (this._token.kind !== 'eof') {
      this._fail(`Expected end of file but found ${describe(this._token)}`);
    }
    return { moduleName, directives, origin };
  }

  private _parseDirective(): PatchDirective {
    const { text, origin } = this._token;
    switch (text) {
      case 'add-modules':
      case 'limit-modules':
      case 'add-reads': {
        this._advance();
        const modules = this._nameList(SPECIAL_CASES[text]);
        return { kind: text, modules, origin };
      }
      case 'add-exports':
      case 'add-opens': {
        this._advance();
        const packageName = this._name('package');
        this._expectWord('to');
        const targets = this._nameList(SPECIAL_CASES[text]);
        return { kind: text, packageName, targets, origin };
      }
      default:
        return this._fail(`Unknown keyword "${text}"`);
    }
  }

  /** name ("," name)* ";" */
  private _nameList(specialCases: ReadonlySet<string>): string[] {
    const names: string[] = [];
    for (;;) {
      if (this._token.kind === 'word' && specialCases.has(this._token.text)) {
        names.push(this._token.text);
        this._advance();
      } else {
        names.push(this._name('module'));
      }

      const separator = this._token;
      if (separator.kind === 'comma') {
        this._advance();
      } else if (separator.kind === 'semicolon') {
        this._advance();
        return names;
      } else {
        this._fail(`Expected "," or ";" but found ${describe(separator)}`);
      }
    }
  }

  private _name(what: 'module' | 'package'): string {
    const token = this._token;
    if (token.kind !== 'word') {
      this._fail(`Expected a ${what} name but found ${describe(token)}`);
    }
    if (!isValidQualifiedName(token.text)) {
      this._fail(`Invalid ${what} name "${token.text}"`);
    }
    this._advance();
    return token.text;
  }

  private _expectWord(expected: string): void {
    if (this._token.kind !== 'word' || this._token.text !== expected) {
      this._fail(`Expected "${expected}" but found ${describe(this._token)}`);
    }
    this._advance();
  }

  private _expect(kind: PatchToken['kind'], text: string): void {
    if (this._token.kind !== kind) {
      this._fail(`Expected "${text}" but found ${describe(this._token)}`);
    }
    this._advance();
  }

  private _advance(): void {
    this._token = this._lexer.next();
  }

  private _fail(reason: string): never {
    throw new PatchSyntaxError(reason, this._token.origin);
  }
}

function describe(token: PatchToken): string {
  return token.kind === 'eof' ? 'end of file' : `"${token.text}"`;
}
