import { describe, it, expect } from "vitest";
import { CompletionItemKind, DiagnosticSeverity, MarkupKind } from "vscode-languageserver/node";
import { DIAGNOSTIC_SOURCE, computeDiagnostics, hoverAt, keywordCompletions, resolveCompletion } from "./features";

function hoverText(text: string, line: number, character: number): string | null {
  const hover = hoverAt(text, line, character);
  if (hover === null) return null;
  expect(hover.contents).toMatchObject({ kind: MarkupKind.Markdown });
  return typeof hover.contents === "object" && "value" in hover.contents ? hover.contents.value : null;
}

describe("computeDiagnostics", () => {
  it("should convert parser diagnostics to zero-based ranges", () => {
    expect(computeDiagnostics("var x")).toEqual([
      {
        severity: DiagnosticSeverity.Error,
        range: { start: { line: 0, character: 5 }, end: { line: 0, character: 6 } },
        message: "expected =, got EOF",
        source: DIAGNOSTIC_SOURCE,
      },
    ]);
  });

  it("should cover string tokens including their quotes", () => {
    const [diagnostic] = computeDiagnostics('"#{a b}"');
    expect(diagnostic.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 8 } });
  });

  it("should return nothing for valid text", () => {
    expect(computeDiagnostics("var x = 1")).toEqual([]);
  });
});

describe("completion", () => {
  it("should offer every keyword", () => {
    const items = keywordCompletions();
    const fn = items.find((item) => item.label === "fn");

    expect(fn).toEqual({ label: "fn", kind: CompletionItemKind.Keyword, data: "fn" });
    expect(items.map((item) => item.label)).toContain("component");
  });

  it("should add details to documented keywords only", () => {
    expect(resolveCompletion({ label: "fn", data: "fn" }).detail).toBe("Function declaration");
    expect(resolveCompletion({ label: "nil", data: "nil" }).detail).toBeUndefined();
  });
});

describe("hoverAt", () => {
  const source = "fn add(a, b) :: return a + b end\nvar total = add(1, 2)";

  it("should describe a declared function at a later use", () => {
    expect(hoverText(source, 1, 12)).toBe("**fn** `add(a, b)`");
  });

  it("should describe parameters", () => {
    expect(hoverText(source, 0, 7)).toBe("**parameter** `a`");
  });

  it("should return null away from identifiers", () => {
    expect(hoverAt(source, 0, 2)).toBeNull();
  });

  it("should describe declared constants with their type", () => {
    expect(hoverText("const limit: number = 3\nlimit", 1, 0)).toBe("**const** `limit: number`");
  });

  it("should describe UI elements", () => {
    const text = "component C() ::\n  Box { a: 1 }\nend";
    expect(hoverText(text, 1, 2)).toBe("**UI element** `Box` (1 properties, 0 children)");
  });

  it("should describe properties and plain identifiers", () => {
    expect(hoverText("user.name", 0, 5)).toBe("**property** `name`");
    expect(hoverText("x", 0, 0)).toBe("**identifier** `x`");
  });
});
