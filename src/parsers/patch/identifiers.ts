/**
 * identifiers.ts
 * Validation of dotted module and package names.
 */

const IDENTIFIER_START = /[\p{L}\p{Nl}\p{Sc}\p{Pc}]/u;
const IDENTIFIER_PART = /[\p{L}\p{Nl}\p{Sc}\p{Pc}\p{Nd}\p{Mn}\p{Mc}]/u;

/**
 * Whether `name` is a non-empty sequence of identifiers separated by single
 * dots, e.g. `org.example.app`. `9bad`, `.a`, `a.` and `a..b` are rejected.
 */
export function isValidQualifiedName(name: string): boolean {
  let expectStart = true;
  for (const ch of name) {
    if (expectStart) {
      if (!IDENTIFIER_START.test(ch)) return false;
      expectStart = false;
    } else if (ch === '.') {
      expectStart = true;
    } else if (!IDENTIFIER_PART.test(ch)) {
      return false;
    }
  }
  return !expectStart;
}
