import * as path from "path";
import type { ParseDiagnostic } from "./parser/diagnostics";

// ANSI color codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const BLUE = "\x1b[34m";

const useColor = process.stderr.isTTY === true;

function c(code: string, text: string): string {
    return useColor ? `${code}${text}${RESET}` : text;
}

/**
 * Every syntax error found in one source file. Thrown by the CLI loader so
 * that commands can render them with source context.
 */
export class ParseError extends Error {
    public diagnostics: ParseDiagnostic[];
    public file: string;
    public source: string;

    constructor(diagnostics: ParseDiagnostic[], file: string, source: string) {
        super(`Parse errors in ${file}`);
        this.name = "ParseError";
        this.diagnostics = diagnostics;
        this.file = file;
        this.source = source;
    }
}

/**
 * Raised inside the parser when a statement cannot be built at all (nesting
 * too deep, a token source without EOF). The statement-level barrier turns it
 * into a recorded diagnostic; it never escapes `Parser.ParseProgram`.
 */
export class ParserFault extends Error {
    public line: number;
    public column: number;

    constructor(message: string, line: number, column: number) {
        super(message);
        this.name = "ParserFault";
        this.line = line;
        this.column = column;
    }
}

/**
 * Format a diagnostic with source context.
 *
 * Example output:
 *   error: expected =, got EOF
 *    --> examples/basic.rv:1:6
 *     |
 *   1 | var x
 *     |      ^
 */
export function formatError(
    message: string,
    file: string,
    line: number,
    col: number,
    source: string,
): string {
    const lines = source.split("\n");
    const lineIdx = line - 1;
    const sourceLine = lineIdx >= 0 && lineIdx < lines.length ? lines[lineIdx].replace(/\r$/, "") : null;

    const gutterWidth = String(line).length;
    const emptyGutter = " ".repeat(gutterWidth);

    const relFile = path.relative(process.cwd(), file) || file;

    const parts: string[] = [
        `${c(BOLD + RED, "error")}${c(BOLD, ": " + message)}`,
        ` ${c(BLUE, "-->")} ${relFile}:${line}:${col}`,
    ];

    if (sourceLine !== null) {
        // columns are 1-based
        const caretOffset = Math.max(0, col - 1);
        parts.push(
            ` ${emptyGutter} ${c(BLUE, "|")}`,
            ` ${c(BLUE, String(line).padStart(gutterWidth))} ${c(BLUE, "|")} ${sourceLine}`,
            ` ${emptyGutter} ${c(BLUE, "|")} ${" ".repeat(caretOffset)}${c(RED, "^")}`,
        );
    }

    return parts.join("\n");
}

/**
 * Render every diagnostic of a ParseError, separated by blank lines.
 */
export function formatParseError(err: ParseError): string {
    return err.diagnostics
        .map((d) => formatError(d.message, err.file, d.line, d.column, err.source))
        .join("\n\n");
}

/**
 * A one-line report for failures that have no source position, such as a
 * file that cannot be read.
 */
export function formatFailure(message: string): string {
    return `${c(BOLD + RED, "error")}${c(BOLD, ": " + message)}`;
}
