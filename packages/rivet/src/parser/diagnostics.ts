import { Token, TokenType } from "../token";
import type { ParserFault } from "../errors";

export interface ParseDiagnostic {
  message: string;
  line: number;
  column: number;
  /** Offending token, when the error points at one. */
  token: Token | null;
  /** Kinds that would have been accepted; empty unless this is an expectation error. */
  expected: TokenType[];
  actual: TokenType | null;
}

/** `a`, `a or b`, `a, b or c` */
export function describeExpected(expected: TokenType[]): string {
  if (expected.length <= 1) return expected.join("");
  return `${expected.slice(0, -1).join(", ")} or ${expected[expected.length - 1]}`;
}

export function expectationDiagnostic(token: Token, expected: TokenType[]): ParseDiagnostic {
  return {
    message: `expected ${describeExpected(expected)}, got ${token.type}`,
    line: token.line,
    column: token.column,
    token,
    expected,
    actual: token.type,
  };
}

export function messageDiagnostic(message: string, token: Token): ParseDiagnostic {
  return {
    message,
    line: token.line,
    column: token.column,
    token,
    expected: [],
    actual: token.type,
  };
}

export function diagnosticToString(d: ParseDiagnostic): string {
  return `line ${d.line}, column ${d.column}: ${d.message}`;
}

/** Faults carry a position but no token. */
export function faultDiagnostic(fault: ParserFault): ParseDiagnostic {
  return {
    message: fault.message,
    line: fault.line,
    column: fault.column,
    token: null,
    expected: [],
    actual: null,
  };
}
