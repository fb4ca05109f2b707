import {
  CompletionItem,
  CompletionItemKind,
  Diagnostic,
  DiagnosticSeverity,
  Hover,
  MarkupKind,
} from "vscode-languageserver/node";
import { Lexer } from "../lexer/lexer";
import { Parser } from "../parser/parser";
import type { ParseDiagnostic } from "../parser/diagnostics";
import { Keywords, Token, TokenType } from "../token";
import * as AST from "../ast/ast";
import { AnyNode, walk } from "../ast/visit";

export const DIAGNOSTIC_SOURCE = "rivet-syntax";

const KEYWORD_DETAILS: Record<string, { detail: string; documentation: string }> = {
  fn: { detail: "Function declaration", documentation: "Declares a function: fn name(params) :: body end" },
  var: { detail: "Variable declaration", documentation: "Declares one or more variables: var a, b = value" },
  const: { detail: "Constant declaration", documentation: "Declares a constant that cannot be reassigned." },
  struct: { detail: "Struct declaration", documentation: "Declares a record type with typed fields." },
  component: { detail: "Component declaration", documentation: "Declares a UI component with a single root element." },
  check: { detail: "Check block", documentation: "Groups setup statements and assertions under an optional label." },
  case: { detail: "Case expression", documentation: "Matches a value against patterns: case x :: 1 => \"one\" end" },
  module: { detail: "Module declaration", documentation: "Groups declarations under a name." },
  using: { detail: "Module import", documentation: "Imports a module by path: using \"path\" as alias" },
};

// A string token's literal is the unescaped content; the quotes are not in it
function tokenWidth(token: Token): number {
  return token.type === TokenType.String ? token.literal.length + 2 : token.literal.length;
}

function parseText(text: string): { program: AST.Program; diagnostics: ParseDiagnostic[] } {
  const parser = new Parser(new Lexer(text));
  const program = parser.ParseProgram();
  return { program, diagnostics: parser.getDiagnostics() };
}

export function toLspDiagnostic(d: ParseDiagnostic): Diagnostic {
  const line = Math.max(0, d.line - 1);
  const character = Math.max(0, d.column - 1);
  const width = Math.max(1, d.token ? tokenWidth(d.token) : 0);
  return {
    severity: DiagnosticSeverity.Error,
    range: {
      start: { line, character },
      end: { line, character: character + width },
    },
    message: d.message,
    source: DIAGNOSTIC_SOURCE,
  };
}

export function computeDiagnostics(text: string): Diagnostic[] {
  return parseText(text).diagnostics.map(toLspDiagnostic);
}

export function keywordCompletions(): CompletionItem[] {
  return Object.keys(Keywords).map((label) => ({ label, kind: CompletionItemKind.Keyword, data: label }));
}

export function resolveCompletion(item: CompletionItem): CompletionItem {
  const details = typeof item.data === "string" ? KEYWORD_DETAILS[item.data] : undefined;
  if (details) {
    item.detail = details.detail;
    item.documentation = details.documentation;
  }
  return item;
}

function isInside(token: Token, line: number, col: number): boolean {
  if (token.line !== line) return false;
  return col >= token.column && col < token.column + tokenWidth(token);
}

function signature(params: AST.Parameter[]): string {
  return `(${params.map((p) => p.toString()).join(", ")})`;
}

/** What each top-level name was declared as, for hovers on later uses. */
function declarations(program: AST.Program): Map<string, string> {
  const found = new Map<string, string>();
  for (const stmt of program.statements) {
    switch (stmt.kind) {
      case "FnStatement": {
        const receiver = stmt.receiver ? `${stmt.receiver}.` : "";
        const returnType = stmt.returnType ? `: ${stmt.returnType}` : "";
        found.set(stmt.name.value, `**fn** \`${receiver}${stmt.name.value}${signature(stmt.parameters)}${returnType}\``);
        break;
      }
      case "VarStatement":
        for (const name of stmt.names) {
          const type = stmt.type ? `: ${stmt.type}` : "";
          found.set(name.value, `**${stmt.constant ? "const" : "var"}** \`${name.value}${type}\``);
        }
        break;
      case "StructStatement":
        found.set(stmt.name.value, `**struct** \`${stmt.name.value}\` (${stmt.fields.length} fields)`);
        break;
      case "ComponentStatement":
        found.set(stmt.name.value, `**component** \`${stmt.name.value}${signature(stmt.parameters)}\``);
        break;
      case "TypeStatement":
        found.set(stmt.name.value, `**type** \`${stmt.name.value} = ${stmt.type}\``);
        break;
      case "ModuleStatement":
        found.set(stmt.name.value, `**module** \`${stmt.name.value}\``);
        break;
      case "UsingStatement":
        if (stmt.alias) found.set(stmt.alias.value, `**using** ${stmt.path} as \`${stmt.alias.value}\``);
        break;
    }
  }
  return found;
}

function describeIdentifier(ident: AST.Identifier, parent: AnyNode | null, known: Map<string, string>): string {
  if (parent instanceof AST.UIElement && parent.type === ident) {
    return `**UI element** \`${ident.value}\` (${parent.properties.size} properties, ${parent.children.length} children)`;
  }
  if (parent instanceof AST.Parameter) {
    return `**parameter** \`${parent}\``;
  }
  if (parent instanceof AST.DotExpression && parent.property === ident) {
    return `**property** \`${ident.value}\``;
  }
  return known.get(ident.value) ?? `**identifier** \`${ident.value}\``;
}

/**
 * Hover text for the identifier under a zero-based editor position, or
 * null when there is none.
 */
export function hoverAt(text: string, line: number, character: number): Hover | null {
  const { program } = parseText(text);
  const known = declarations(program);
  const targetLine = line + 1;
  const targetCol = character + 1;

  const matches: { ident: AST.Identifier; parent: AnyNode | null }[] = [];
  walk(program, (node, parents) => {
    // embedded expressions carry positions relative to the string
    if (node instanceof AST.InterpolatedString) return false;
    if (node instanceof AST.Identifier && isInside(node.token, targetLine, targetCol)) {
      matches.push({ ident: node, parent: parents.length > 0 ? parents[parents.length - 1] : null });
    }
  });
  if (matches.length === 0) return null;

  // the innermost match is visited last
  const { ident, parent } = matches[matches.length - 1];
  return { contents: { kind: MarkupKind.Markdown, value: describeIdentifier(ident, parent, known) } };
}
