import { describe, it, expect } from "vitest";
import { Lexer, tokenize } from "./lexer";
import { TokenType } from "../token";

describe("Lexer", () => {
  it("should tokenize operators and punctuation", () => {
    const input = "= == => ! != : :: . .. ... -> - , ; ( ) [ ] { } + * / % ^ < > <= >= && ||";
    const lexer = new Lexer(input);

    const tests = [
      { type: TokenType.Assign, literal: "=" },
      { type: TokenType.EqEq, literal: "==" },
      { type: TokenType.Arrow, literal: "=>" },
      { type: TokenType.Not, literal: "!" },
      { type: TokenType.NotEq, literal: "!=" },
      { type: TokenType.Colon, literal: ":" },
      { type: TokenType.DoubleColon, literal: "::" },
      { type: TokenType.Dot, literal: "." },
      { type: TokenType.Range, literal: ".." },
      { type: TokenType.RangeInclusive, literal: "..." },
      { type: TokenType.TypeArrow, literal: "->" },
      { type: TokenType.Minus, literal: "-" },
      { type: TokenType.Comma, literal: "," },
      { type: TokenType.Semi, literal: ";" },
      { type: TokenType.LParen, literal: "(" },
      { type: TokenType.RParen, literal: ")" },
      { type: TokenType.LBracket, literal: "[" },
      { type: TokenType.RBracket, literal: "]" },
      { type: TokenType.LBrace, literal: "{" },
      { type: TokenType.RBrace, literal: "}" },
      { type: TokenType.Plus, literal: "+" },
      { type: TokenType.Star, literal: "*" },
      { type: TokenType.Slash, literal: "/" },
      { type: TokenType.Percent, literal: "%" },
      { type: TokenType.Caret, literal: "^" },
      { type: TokenType.LT, literal: "<" },
      { type: TokenType.GT, literal: ">" },
      { type: TokenType.LtEq, literal: "<=" },
      { type: TokenType.GtEq, literal: ">=" },
      { type: TokenType.And, literal: "&&" },
      { type: TokenType.Or, literal: "||" },
      { type: TokenType.EOF, literal: "" },
    ];

    tests.forEach((tt) => {
      const tok = lexer.nextToken();
      expect(tok.type).toBe(tt.type);
      expect(tok.literal).toBe(tt.literal);
    });
  });

  it("should look up keywords and leave other words as identifiers", () => {
    const input = "var const fn struct component nil self isA startsWith and or not number foo _bar baz9";
    const types = tokenize(input).map((tok) => tok.type);

    expect(types).toEqual([
      TokenType.Var,
      TokenType.Const,
      TokenType.Fn,
      TokenType.Struct,
      TokenType.Component,
      TokenType.Nil,
      TokenType.Self,
      TokenType.IsA,
      TokenType.StartsWith,
      TokenType.And,
      TokenType.Or,
      TokenType.Not,
      TokenType.NumberType,
      TokenType.Identifier,
      TokenType.Identifier,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
  });

  it("should only treat a dot followed by a digit as a decimal point", () => {
    const tokens = tokenize("42 3.14 1..5");

    expect(tokens.map((tok) => [tok.type, tok.literal])).toEqual([
      [TokenType.Number, "42"],
      [TokenType.Number, "3.14"],
      [TokenType.Number, "1"],
      [TokenType.Range, ".."],
      [TokenType.Number, "5"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should unescape string literals", () => {
    const tokens = tokenize('"a\\nb" "say \\"hi\\"" "x\\qy"');

    expect(tokens[0]).toMatchObject({ type: TokenType.String, literal: "a\nb" });
    expect(tokens[1]).toMatchObject({ type: TokenType.String, literal: 'say "hi"' });
    // unknown escapes keep their backslash
    expect(tokens[2]).toMatchObject({ type: TokenType.String, literal: "x\\qy" });
  });

  it("should return an illegal token for an unterminated string", () => {
    const tokens = tokenize('"abc');
    expect(tokens[0]).toMatchObject({ type: TokenType.Illegal, literal: "abc" });
    expect(tokens[1].type).toBe(TokenType.EOF);
  });

  it("should stop at a backslash that ends the input", () => {
    const tokens = tokenize('"a\\');
    expect(tokens[0]).toMatchObject({ type: TokenType.Illegal, literal: "a" });
    expect(tokens[1].type).toBe(TokenType.EOF);
  });

  it("should produce comment tokens, including nested block comments", () => {
    const tokens = tokenize("x # note\n#| a #| b |# c |# y");

    expect(tokens.map((tok) => [tok.type, tok.literal])).toEqual([
      [TokenType.Identifier, "x"],
      [TokenType.Comment, "# note"],
      [TokenType.Comment, "#| a #| b |# c |#"],
      [TokenType.Identifier, "y"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should track 1-based lines and columns", () => {
    const tokens = tokenize("var x\n  y");

    expect(tokens.map((tok) => [tok.literal, tok.line, tok.column])).toEqual([
      ["var", 1, 1],
      ["x", 1, 5],
      ["y", 2, 3],
      ["", 2, 4],
    ]);
  });

  it("should mark stray characters as illegal", () => {
    const tokens = tokenize("@ & |");
    expect(tokens.map((tok) => [tok.type, tok.literal])).toEqual([
      [TokenType.Illegal, "@"],
      [TokenType.Illegal, "&"],
      [TokenType.Illegal, "|"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should keep returning EOF at the end of input", () => {
    const lexer = new Lexer("x");
    lexer.nextToken();
    expect(lexer.nextToken().type).toBe(TokenType.EOF);
    expect(lexer.nextToken().type).toBe(TokenType.EOF);
  });
});
