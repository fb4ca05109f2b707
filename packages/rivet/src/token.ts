export enum TokenType {
  Illegal = "ILLEGAL",
  EOF = "EOF",
  Comment = "COMMENT",

  // Literals
  Identifier = "IDENT",
  Number = "NUMBER",
  String = "STRING",

  // Operators
  Assign = "=",
  Plus = "+",
  Minus = "-",
  Star = "*",
  Slash = "/",
  Percent = "%",
  Caret = "^",
  EqEq = "==",
  NotEq = "!=",
  LT = "<",
  GT = ">",
  LtEq = "<=",
  GtEq = ">=",
  And = "and", // and, &&
  Or = "or",   // or, ||
  Not = "not", // not, !

  // Symbols
  Comma = ",",
  Semi = ";",
  Colon = ":",
  DoubleColon = "::", // opens every block
  Dot = ".",
  LParen = "(",
  RParen = ")",
  LBracket = "[",
  RBracket = "]",
  LBrace = "{",
  RBrace = "}",
  Arrow = "=>",
  TypeArrow = "->",
  Range = "..",
  RangeInclusive = "...",

  // Keywords
  Var = "var",
  Const = "const",
  Fn = "fn",
  Struct = "struct",
  Type = "type",
  Module = "module",
  Using = "using",
  As = "as",
  Component = "component",
  If = "if",
  Else = "else",
  Case = "case",
  For = "for",
  In = "in",
  Check = "check",
  Where = "where",
  End = "end",
  Return = "return",
  Break = "break",
  Self = "self",
  True = "true",
  False = "false",
  Nil = "nil",

  // Assertion operators
  Is = "is",
  IsA = "isA",
  IsNot = "isNot",
  Contains = "contains",
  IsGreater = "isGreater",
  IsLess = "isLess",
  IsTrue = "isTrue",
  IsFalse = "isFalse",
  IsEmpty = "isEmpty",
  StartsWith = "startsWith",
  EndsWith = "endsWith",
  Raises = "raises",

  // Type keywords
  NumberType = "number",
  StringType = "string",
  BooleanType = "boolean",
}

export interface Token {
  type: TokenType;
  literal: string;
  line: number;
  column: number;
}

export const Keywords: Record<string, TokenType> = {
  var: TokenType.Var,
  const: TokenType.Const,
  fn: TokenType.Fn,
  struct: TokenType.Struct,
  type: TokenType.Type,
  module: TokenType.Module,
  using: TokenType.Using,
  as: TokenType.As,
  component: TokenType.Component,
  if: TokenType.If,
  else: TokenType.Else,
  case: TokenType.Case,
  for: TokenType.For,
  in: TokenType.In,
  check: TokenType.Check,
  where: TokenType.Where,
  end: TokenType.End,
  return: TokenType.Return,
  break: TokenType.Break,
  self: TokenType.Self,
  true: TokenType.True,
  false: TokenType.False,
  nil: TokenType.Nil,
  is: TokenType.Is,
  isA: TokenType.IsA,
  isNot: TokenType.IsNot,
  contains: TokenType.Contains,
  isGreater: TokenType.IsGreater,
  isLess: TokenType.IsLess,
  isTrue: TokenType.IsTrue,
  isFalse: TokenType.IsFalse,
  isEmpty: TokenType.IsEmpty,
  startsWith: TokenType.StartsWith,
  endsWith: TokenType.EndsWith,
  raises: TokenType.Raises,
  number: TokenType.NumberType,
  string: TokenType.StringType,
  boolean: TokenType.BooleanType,
  and: TokenType.And,
  or: TokenType.Or,
  not: TokenType.Not,
};

export function lookupIdent(ident: string): TokenType {
  return Object.prototype.hasOwnProperty.call(Keywords, ident) ? Keywords[ident] : TokenType.Identifier;
}

/**
 * True when the token is spelled as a keyword. `&&`, `||` and `!` share their
 * token types with `and`, `or` and `not` but are not words.
 */
export function isKeyword(tok: Token): boolean {
  return tok.type !== TokenType.Identifier && lookupIdent(tok.literal) === tok.type;
}
