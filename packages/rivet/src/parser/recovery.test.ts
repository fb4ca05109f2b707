import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { TokenStream } from "../lexer/source";
import { Parser, ParserOptions } from "./parser";
import * as AST from "../ast/ast";
import { TokenType } from "../token";

function parseWithErrors(input: string, options?: ParserOptions) {
  const parser = new Parser(new Lexer(input), options);
  const program = parser.ParseProgram();
  return { parser, program, errors: parser.getErrors() };
}

describe("Parser error reporting", () => {
  it("should report a missing initializer at EOF", () => {
    const { errors } = parseWithErrors("var x");
    expect(errors).toEqual(["line 1, column 6: expected =, got EOF"]);
  });

  it("should keep parsing after a broken statement", () => {
    const { errors, program } = parseWithErrors("var = 5\nvar y = 2");
    expect(errors).toEqual(["line 1, column 5: expected IDENT, got ="]);
    expect(program.statements.map((s) => s.toString())).toEqual(["var y = 2"]);
  });

  it("should not skip a statement the failure stopped on", () => {
    const { errors, program } = parseWithErrors("x = \nvar y = 1");
    expect(errors).toEqual(["line 2, column 1: no prefix parse function for var found"]);
    expect(program.statements.length).toBe(1);
    expect(program.statements[0]).toBeInstanceOf(AST.VarStatement);
  });

  it("should keep the enclosing block when a statement inside it fails", () => {
    const { errors, program } = parseWithErrors("fn f() :: x = end");
    expect(errors).toEqual(["line 1, column 15: no prefix parse function for end found"]);

    const fn = program.statements[0];
    expect(fn).toBeInstanceOf(AST.FnStatement);
    if (fn instanceof AST.FnStatement) {
      expect(fn.body.statements).toEqual([]);
    }
  });

  it("should recover a :: that arrives a few tokens late", () => {
    const { errors, program } = parseWithErrors("fn f() x :: 1 end");
    expect(errors).toEqual(["line 1, column 8: expected ::, got IDENT"]);
    expect(program.statements.length).toBe(1);
  });

  it("should give up on a :: outside the recovery window", () => {
    const { errors, program } = parseWithErrors("fn f() a b c d e f :: 1 end");
    expect(errors).toEqual(["line 1, column 8: expected ::, got IDENT", "line 1, column 25: unexpected 'end'"]);
    expect(program.statements).toEqual([]);
  });

  it("should report stray block terminators", () => {
    const { errors, program } = parseWithErrors("fn f() :: else end");
    expect(errors).toEqual(["line 1, column 11: unexpected 'else'"]);
    expect(program.statements.length).toBe(1);
  });

  it("should return every block cut short by EOF", () => {
    const tests: [string, string][] = [
      ["fn f() :: x", "line 1, column 12: expected where or end, got EOF"],
      ["if x :: y", "line 1, column 10: expected else or end, got EOF"],
      ["for i in xs :: y", "line 1, column 17: expected end, got EOF"],
      ["case x :: 1 => 2", "line 1, column 17: expected end, got EOF"],
      ["struct P :: a: number", "line 1, column 22: expected end, got EOF"],
      ["module M :: var a = 1", "line 1, column 22: expected end, got EOF"],
      ["component C() :: Box {}", "line 1, column 24: expected end, got EOF"],
      ["check :: 1 is 1", "line 1, column 16: expected end, got EOF"],
      ["fn f() :: 1 where :: 1 is 1", "line 1, column 28: expected end, got EOF"],
    ];

    tests.forEach(([input, expected]) => {
      const { errors, program } = parseWithErrors(input);
      expect(errors).toEqual([expected]);
      expect(program.statements.length).toBe(1);
    });
  });

  it("should reject invalid assignment targets", () => {
    const { errors, program } = parseWithErrors("1 + 2 = 3");
    expect(errors).toEqual(["line 1, column 7: invalid assignment target: (1 + 2)"]);
    expect(program.statements).toEqual([]);
  });

  it("should name the token after a dot that is not a property", () => {
    const { errors } = parseWithErrors("a.5");
    expect(errors).toEqual(["line 1, column 3: expected property name, got NUMBER instead"]);
  });

  it("should report reserved words used as names once", () => {
    const { errors, program } = parseWithErrors("var fn = 1");
    expect(errors).toEqual(["line 1, column 5: 'fn' is a reserved word (in variable name)"]);
    expect(program.statements.length).toBe(1);

    const struct = parseWithErrors("struct S :: type: string end");
    expect(struct.errors).toEqual(["line 1, column 13: 'type' is a reserved word (in struct field)"]);
    const stmt = struct.program.statements[0];
    expect(stmt).toBeInstanceOf(AST.StructStatement);
    if (stmt instanceof AST.StructStatement) {
      expect(stmt.fields.map((f) => f.toString())).toEqual(["type: string"]);
    }
  });

  it("should not take symbol operators for names", () => {
    expect(parseWithErrors("var ! = 1").errors).toEqual(["line 1, column 5: expected IDENT, got not"]);
    expect(parseWithErrors("a.||").errors).toEqual(["line 1, column 3: expected property name, got or instead"]);
    expect(parseWithErrors("Box { &&: 1 }").errors).toEqual(["line 1, column 7: expected IDENT or }, got and"]);
    expect(parseWithErrors("struct S :: !: number end").errors).toEqual([
      "line 1, column 13: expected IDENT or end, got not",
    ]);
    expect(parseWithErrors("var and = 1").errors).toEqual(["line 1, column 5: 'and' is a reserved word (in variable name)"]);
  });

  it("should end a struct missing its end at the next declaration", () => {
    const { errors, program } = parseWithErrors("struct P :: a: number\nfn f() :: 1 end\nvar z = 1");
    expect(errors).toEqual(["line 2, column 1: expected end, got fn"]);
    expect(program.statements.map((s) => s.kind)).toEqual(["StructStatement", "FnStatement", "VarStatement"]);
    expect(program.statements[0].toString()).toBe("struct P ::\n  a: number\nend");
  });

  describe("components", () => {
    it("should require a root element", () => {
      const { errors } = parseWithErrors("component Empty() :: var x = 1 end");
      expect(errors).toEqual(["line 1, column 11: component 'Empty' has no root element"]);
    });

    it("should reject a second root element", () => {
      const { errors } = parseWithErrors("component Two() :: A {} B {} end");
      expect(errors).toEqual(["line 1, column 25: component 'Two' already has a root element"]);
    });

    it("should keep the first value of a duplicate property", () => {
      const { errors, program } = parseWithErrors("Box { a: 1, a: 2 }");
      expect(errors).toEqual(["line 1, column 13: duplicate property 'a'"]);

      const stmt = program.statements[0];
      expect(stmt).toBeInstanceOf(AST.ExpressionStatement);
      if (stmt instanceof AST.ExpressionStatement && stmt.expression instanceof AST.UIElement) {
        expect(stmt.expression.properties.get("a")?.toString()).toBe("1");
      }
    });
  });

  describe("string interpolation", () => {
    it("should report embedded errors at the string", () => {
      const { errors } = parseWithErrors('var s = "#{1 +}"');
      expect(errors).toEqual(["line 1, column 9: in string interpolation: no prefix parse function for EOF found"]);
    });

    it("should reject more than one embedded expression", () => {
      const { errors } = parseWithErrors('"#{a b}"');
      expect(errors).toEqual(["line 1, column 1: in string interpolation: unexpected IDENT after expression"]);
    });
  });

  describe("nesting depth", () => {
    it("should abandon a statement nested past the limit", () => {
      const input = "(".repeat(300) + "1" + ")".repeat(300);
      const { errors } = parseWithErrors(input);
      expect(errors).toEqual(["line 1, column 257: maximum nesting depth of 256 exceeded"]);
    });

    it("should honour a configured limit", () => {
      expect(parseWithErrors("((1))", { maxDepth: 3 }).errors).toEqual([]);
      expect(parseWithErrors("(((1)))", { maxDepth: 3 }).errors).toEqual([
        "line 1, column 4: maximum nesting depth of 3 exceeded",
      ]);
    });
  });

  it("should treat a token stream without EOF as ended", () => {
    const parser = new Parser(new TokenStream([{ type: TokenType.Identifier, literal: "x", line: 1, column: 1 }]));
    const program = parser.ParseProgram();

    expect(program.statements.length).toBe(1);
    expect(parser.getErrors()).toEqual(["line 1, column 1: token stream ended without EOF"]);
  });

  it("should number formatted errors", () => {
    const { parser } = parseWithErrors("var x\nvar y");
    expect(parser.formatErrors()).toEqual([
      "  1. line 2, column 1: expected =, got var",
      "  2. line 2, column 6: expected =, got EOF",
    ]);
  });

  it("should report the same errors after clearErrors and a fresh parse", () => {
    const first = parseWithErrors("var x");
    expect(first.parser.hasErrors()).toBe(true);

    first.parser.clearErrors();
    expect(first.parser.hasErrors()).toBe(false);
    expect(first.parser.getErrors()).toEqual([]);

    expect(parseWithErrors("var x").errors).toEqual(first.errors);
  });
});
