import { Lexer } from "./lexer/lexer";
import { Parser, ParserOptions } from "./parser/parser";
import type { Program } from "./ast/ast";
import type { ParseDiagnostic } from "./parser/diagnostics";

export * from "./token";
export { Lexer, tokenize } from "./lexer/lexer";
export { TokenStream } from "./lexer/source";
export type { TokenSource } from "./lexer/source";
export { Parser, DEFAULT_MAX_DEPTH } from "./parser/parser";
export type { ParserOptions } from "./parser/parser";
export { describeExpected, diagnosticToString } from "./parser/diagnostics";
export type { ParseDiagnostic } from "./parser/diagnostics";
export * as AST from "./ast/ast";
export { children, structure, walk } from "./ast/visit";
export type { AnyNode } from "./ast/visit";
export { ParseError, ParserFault, formatError, formatParseError } from "./errors";

export interface ParseResult {
  program: Program;
  /** `line L, column C: message`, in the order they were found. */
  errors: string[];
  diagnostics: ParseDiagnostic[];
}

export function parse(source: string, options: ParserOptions = {}): ParseResult {
  const parser = new Parser(new Lexer(source), options);
  const program = parser.ParseProgram();
  return { program, errors: parser.getErrors(), diagnostics: parser.getDiagnostics() };
}
