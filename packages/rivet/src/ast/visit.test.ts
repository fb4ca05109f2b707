import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { Parser } from "../parser/parser";
import * as AST from "./ast";
import { AnyNode, children, structure, walk } from "./visit";

function parse(input: string): AST.Program {
  const parser = new Parser(new Lexer(input));
  const program = parser.ParseProgram();
  expect(parser.getErrors()).toEqual([]);
  return program;
}

describe("structure", () => {
  it("should indent kinds by depth", () => {
    expect(structure(parse("var x = 1 + 2"))).toBe(
      [
        "Program",
        "  VarStatement",
        "    Identifier",
        "    InfixExpression",
        "      NumberLiteral",
        "      NumberLiteral",
      ].join("\n"),
    );
  });
});

describe("walk", () => {
  it("should skip the children of a node the visitor rejects", () => {
    const names: string[] = [];
    walk(parse('f("#{a}", b)'), (node) => {
      if (node instanceof AST.InterpolatedString) return false;
      if (node instanceof AST.Identifier) names.push(node.value);
    });
    expect(names).toEqual(["f", "b"]);
  });

  it("should pass the chain of parents", () => {
    let depth = -1;
    walk(parse("a.b"), (node, parents) => {
      if (node instanceof AST.Identifier && node.value === "b") {
        depth = parents.length;
      }
    });
    // Program > ExpressionStatement > DotExpression > b
    expect(depth).toBe(3);
  });

  it("should list the properties and children of a UI element", () => {
    const [stmt] = parse("Box { a: 1, Text {} }").statements;
    const kinds = children(stmt).flatMap((node: AnyNode) => children(node).map((c) => c.kind));
    expect(kinds).toEqual(["Identifier", "NumberLiteral", "UIElement"]);
  });
});

describe("canonical form", () => {
  const inputs = [
    "var x = 5",
    'const name: string = "Ada"',
    "var a, b = pair()",
    "-a * b + not c",
    "-x ^ 2",
    "3 + 4; -5 * 5",
    "a.b = c[0]",
    "x = y = 3",
    '{"a": 1, "b": [1, 2]}',
    "for n in 1...3 :: break end",
    "for i, v in items :: print(v) end",
    "list.map((x) :: x * 2 end)",
    "apply((a, b: number) :: a + b end)",
    '"Count: #{count} and #{a + b}"',
    '"tab\\there \\"quoted\\""',
    'using "std/math" as m',
    "type Pairs = Map[string, Array[number]]",
    "struct Point :: x: number, y: number end",
    "struct Empty :: end",
    "module Geo :: fn area(r) :: return r * r end end",
    "case x :: 1 => a; 2 => b end",
    'var gpa = case grade :: "A" => 4.0; _ => 0.0 end',
    "if a :: x else if b :: y else :: z end",
    'fn f() :: return nil, error("bad") end',
    `fn Person.greet(greeting: string, times): string ::
  return greeting
where ::
  var p = Person()
  p.greet("hi", 1) is "hi"
end`,
    `check "math" ::
  var x = 10
  x is 10
  "" isEmpty
  (10 / 0) raises "division by zero"
  boom() raises
  log(x)
end`,
    `component Counter(start) ::
  var count = start
  Window {
    title: "Counter #{count}",
    VBox {
      Text { text: "hi" }
      Button { label: "+", onClick: fn() :: count = count + 1 end }
    }
  }
end`,
  ];

  it("should parse back to the same tree", () => {
    inputs.forEach((input) => {
      const first = parse(input);
      const second = parse(first.toString());
      expect(structure(second)).toBe(structure(first));
    });
  });

  it("should print a parsed program unchanged a second time", () => {
    inputs.forEach((input) => {
      const printed = parse(input).toString();
      expect(parse(printed).toString()).toBe(printed);
    });
  });

  it("should print an empty component body and element compactly", () => {
    expect(parse("struct Empty :: end").toString()).toBe("struct Empty ::\nend");
    expect(parse("Box {}").toString()).toBe("Box {}");
  });
});
