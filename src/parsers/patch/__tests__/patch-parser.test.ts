/**
 * patch-parser.test.ts
 *
 * Grammar acceptance and rejection for module-info-patch.txt content.
 * Rejections are checked on the error's reason and position, which is what
 * users see next to the file name.
 */

import { PatchParser } from '../patch-parser.js';
import { PatchSyntaxError } from '../patch-syntax-error.js';
import { isValidQualifiedName } from '../identifiers.js';

function parseError(source: string, file?: string): PatchSyntaxError {
  try {
    PatchParser.parse(source, file);
  } catch (err) {
    if (err instanceof PatchSyntaxError) return err;
    throw err;
  }
  throw new Error('Expected a PatchSyntaxError');
}

const FULL_EXAMPLE = `
patch-module org.example.app {
    limit-modules A, B, C;
    add-reads X, Y, TEST-MODULE-PATH;
    add-exports some.pkg to ModA, ALL-UNNAMED;
    add-opens some.pkg to ModB;
}
`;

describe('PatchParser', () => {
  describe('accepted input', () => {
    it('parses every directive in file order', () => {
      const decl = PatchParser.parse(FULL_EXAMPLE);
      expect(decl.moduleName).toBe('org.example.app');
      expect(decl.origin).toEqual({ line: 2, column: 1 });
      expect(decl.directives).toEqual([
        { kind: 'limit-modules', modules: ['A', 'B', 'C'], origin: { line: 3, column: 5 } },
        { kind: 'add-reads', modules: ['X', 'Y', 'TEST-MODULE-PATH'], origin: { line: 4, column: 5 } },
        {
          kind: 'add-exports',
          packageName: 'some.pkg',
          targets: ['ModA', 'ALL-UNNAMED'],
          origin: { line: 5, column: 5 },
        },
        { kind: 'add-opens', packageName: 'some.pkg', targets: ['ModB'], origin: { line: 6, column: 5 } },
      ]);
    });

    it('accepts an empty body', () => {
      expect(PatchParser.parse('patch-module m {}').directives).toEqual([]);
    });

    it('accepts the special keywords where each directive allows them', () => {
      const decl = PatchParser.parse(
        'patch-module m {\n' +
        '  add-modules ALL-MODULE-PATH, TEST-MODULE-PATH;\n' +
        '  add-reads X, TEST-MODULE-PATH;\n' +
        '  add-exports p to TEST-MODULE-PATH, ALL-UNNAMED;\n' +
        '}',
      );
      expect(decl.directives.map((d) => ('modules' in d ? d.modules : d.targets))).toEqual([
        ['ALL-MODULE-PATH', 'TEST-MODULE-PATH'],
        ['X', 'TEST-MODULE-PATH'],
        ['TEST-MODULE-PATH', 'ALL-UNNAMED'],
      ]);
    });

    it('ignores line and block comments anywhere between tokens', () => {
      const decl = PatchParser.parse(
        '/* header */\n' +
        'patch-module a.b { // trailing\n' +
        '  add-reads c.d; /* inline */ add-opens p to e;\n' +
        '}\n',
      );
      expect(decl.moduleName).toBe('a.b');
      expect(decl.directives.map((d) => d.kind)).toEqual(['add-reads', 'add-opens']);
    });
  });

  describe('rejected input', () => {
    it('rejects a module name starting with a digit', () => {
      const err = parseError('patch-module 9bad { add-reads X; }');
      expect(err.reason).toBe('Invalid module name "9bad"');
      expect(err.line).toBe(1);
      expect(err.column).toBe(14);
      expect(err.message).toBe('Invalid module name "9bad" (line 1)');
    });

    it('rejects a missing comma between names', () => {
      const err = parseError('patch-module ok {\n  add-reads X Y;\n}');
      expect(err.reason).toBe('Expected "," or ";" but found "Y"');
      expect(err.line).toBe(2);
      expect(err.column).toBe(15);
    });

    it('rejects an unknown keyword on its own line', () => {
      const err = parseError('patch-module ok {\n  add-uses X;\n}');
      expect(err.reason).toBe('Unknown keyword "add-uses"');
      expect(err.line).toBe(2);
    });

    it('rejects a file that does not start with patch-module', () => {
      expect(parseError('module ok {}').reason).toBe('Expected "patch-module" but found "module"');
      expect(parseError('').reason).toBe('Expected "patch-module" but found end of file');
    });

    it('rejects a missing opening brace', () => {
      expect(parseError('patch-module ok add-reads X; }').reason).toBe(
        'Expected "{" but found "add-reads"',
      );
    });

    it('rejects a missing closing brace', () => {
      expect(parseError('patch-module ok { add-reads X;').reason).toBe(
        'Expected "}" but found end of file',
      );
    });

    it('rejects content after the closing brace', () => {
      expect(parseError('patch-module ok { } extra').reason).toBe(
        'Expected end of file but found "extra"',
      );
    });

    it('rejects add-exports without "to"', () => {
      expect(parseError('patch-module ok { add-exports p.q ModA; }').reason).toBe(
        'Expected "to" but found "ModA"',
      );
    });

    it('rejects an empty name list', () => {
      expect(parseError('patch-module ok { add-reads ; }').reason).toBe(
        'Expected a module name but found ";"',
      );
    });

    it('rejects an invalid package name', () => {
      expect(parseError('patch-module ok { add-exports 1p to A; }').reason).toBe(
        'Invalid package name "1p"',
      );
    });

    it('rejects special keywords where the directive does not allow them', () => {
      expect(parseError('patch-module ok { add-opens p to TEST-MODULE-PATH; }').reason).toBe(
        'Invalid module name "TEST-MODULE-PATH"',
      );
      expect(parseError('patch-module ok { add-reads ALL-UNNAMED; }').reason).toBe(
        'Invalid module name "ALL-UNNAMED"',
      );
    });

    it('includes the file name and column when parsing from a file', () => {
      const err = parseError('patch-module 9bad {}', '/p/module-info-patch.txt');
      expect(err.fileName).toBe('/p/module-info-patch.txt');
      expect(err.message).toBe('Invalid module name "9bad" (/p/module-info-patch.txt:1:14)');
    });
  });
});

describe('isValidQualifiedName', () => {
  it.each(['a', 'a.b.c', '$x_1', 'é.ü', 'org.example.v2'])('accepts %s', (name) => {
    expect(isValidQualifiedName(name)).toBe(true);
  });

  it.each(['', '9a', 'a.9b', '.a', 'a.', 'a..b', 'a-b'])('rejects "%s"', (name) => {
    expect(isValidQualifiedName(name)).toBe(false);
  });
});
