import { describe, it, expect } from "vitest";
import { ParseError, ParserFault, formatError, formatFailure, formatParseError } from "./errors";
import { Lexer } from "./lexer/lexer";
import { Parser } from "./parser/parser";

// Strip ANSI escape codes for assertion readability
function strip(s: string): string {
    return s.replace(/\x1b\[[0-9;]*m/g, "");
}

function parseError(source: string, file: string): ParseError {
    const parser = new Parser(new Lexer(source));
    parser.ParseProgram();
    return new ParseError(parser.getDiagnostics(), file, source);
}

describe("formatError", () => {
    it("should format a single-digit line error with caret", () => {
        const source = "var x = 10\nvar y = )";
        const output = strip(formatError("no prefix parse function for ) found", "/tmp/test.rv", 2, 9, source));

        expect(output).toContain("error: no prefix parse function for ) found");
        expect(output).toContain("--> ");
        expect(output).toContain("test.rv:2:9");
        expect(output).toContain("2 | var y = )");
    });

    it("should align the caret to the correct column", () => {
        const source = "    var x = )";
        const output = strip(formatError("bad", "/tmp/t.rv", 1, 13, source));
        const lines = output.split("\n");

        // caret at column 13 (1-based): 12 spaces after the "| "
        const caretLine = lines[lines.length - 1];
        expect(caretLine).toBe("   | " + " ".repeat(12) + "^");
    });

    it("should handle multi-digit line numbers with correct gutter width", () => {
        const lines: string[] = Array(100).fill("x");
        lines[99] = "var z = ";
        const source = lines.join("\n");

        const output = strip(formatError("error here", "/tmp/t.rv", 100, 9, source));
        expect(output).toContain(" 100 | var z = ");
        // empty gutter is as wide as "100"
        expect(output.split("\n")[2]).toBe("     |");
    });

    it("should leave out the source context when the line is out of range", () => {
        const source = "only one line";
        const output = strip(formatError("phantom error", "/tmp/t.rv", 99, 1, source));
        expect(output).toContain("error: phantom error");
        expect(output).toContain("t.rv:99:1");
        expect(output.split("\n")).toHaveLength(2);
    });

    it("should always report at error severity", () => {
        expect(formatError).toHaveLength(5);
        expect(strip(formatError("bad", "/tmp/t.rv", 1, 1, "x")).split("\n")[0]).toBe("error: bad");
    });
});

describe("formatParseError", () => {
    it("should render each diagnostic with its source line", () => {
        const output = strip(formatParseError(parseError("var x", "/tmp/test.rv")));
        const lines = output.split("\n");

        expect(lines[0]).toBe("error: expected =, got EOF");
        expect(lines[1]).toContain("test.rv:1:6");
        expect(lines[3]).toBe(" 1 | var x");
        expect(lines[4]).toBe("   | " + " ".repeat(5) + "^");
    });

    it("should separate diagnostics with a blank line", () => {
        const output = strip(formatParseError(parseError("var x\nvar y", "/tmp/test.rv")));
        const blocks = output.split("\n\n");

        expect(blocks).toHaveLength(2);
        expect(blocks[0].split("\n")[0]).toBe("error: expected =, got var");
        expect(blocks[1].split("\n")[0]).toBe("error: expected =, got EOF");
    });
});

describe("ParseError", () => {
    it("should carry the diagnostics, file and source", () => {
        const err = parseError("var x", "/tmp/test.rv");

        expect(err).toBeInstanceOf(Error);
        expect(err.diagnostics).toHaveLength(1);
        expect(err.file).toBe("/tmp/test.rv");
        expect(err.source).toBe("var x");
        expect(err.message).toBe("Parse errors in /tmp/test.rv");
    });
});

describe("ParserFault", () => {
    it("should keep its position", () => {
        const fault = new ParserFault("maximum nesting depth of 3 exceeded", 2, 7);
        expect(fault.message).toBe("maximum nesting depth of 3 exceeded");
        expect([fault.line, fault.column]).toEqual([2, 7]);
    });
});

describe("formatFailure", () => {
    it("should print a one-line error", () => {
        expect(strip(formatFailure("file not found"))).toBe("error: file not found");
    });
});
