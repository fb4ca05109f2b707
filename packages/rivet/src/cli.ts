#!/usr/bin/env node
import * as fs from "fs";
import { Lexer, tokenize } from "./lexer/lexer";
import { Parser } from "./parser/parser";
import { structure } from "./ast/visit";
import * as AST from "./ast/ast";
import { ParseError, formatFailure, formatParseError } from "./errors";
import { startServer } from "./lsp/server";

export const VERSION = "0.1.0";

export interface Output {
    out(line: string): void;
    err(line: string): void;
}

const consoleOutput: Output = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

function printUsage(io: Output) {
    io.out(`rivet ${VERSION} — parser front end for the Rivet language

USAGE:
    rivet <command> [file.rv]

COMMANDS:
    parse <file>    Print each top-level statement in canonical form
    ast <file>      Print the syntax tree as an indented list of node kinds
    tokens <file>   Print the token stream
    check <file>    Report syntax errors, or print "ok"
    lsp             Start the language server (stdio unless --node-ipc,
                    --socket=N or --pipe=NAME is given)
    help            Show this help message
    version         Print version

EXAMPLES:
    rivet check app.rv
    rivet ast app.rv`);
}

/**
 * Read and parse a source file. Throws ParseError when the file has syntax
 * errors.
 */
export function loadProgram(file: string): AST.Program {
    const source = fs.readFileSync(file, "utf-8");
    const parser = new Parser(new Lexer(source));
    const program = parser.ParseProgram();
    if (parser.hasErrors()) {
        throw new ParseError(parser.getDiagnostics(), file, source);
    }
    return program;
}

function withFile(args: string[], io: Output, action: (file: string) => void): number {
    const file = args[0];
    if (!file) {
        io.err("error: no input file specified\n");
        io.err("Usage: rivet <command> <file.rv>");
        return 1;
    }

    try {
        action(file);
        return 0;
    } catch (e) {
        if (e instanceof ParseError) {
            io.err(formatParseError(e));
            io.err("");
            io.err(`${e.diagnostics.length} syntax error${e.diagnostics.length === 1 ? "" : "s"} in ${file}`);
            return 1;
        }
        io.err(formatFailure(e instanceof Error ? e.message : String(e)));
        return 1;
    }
}

/**
 * Run one command and return the process exit code. `lsp` is handled by
 * `main`, since the server outlives the call.
 */
export function run(args: string[], io: Output = consoleOutput): number {
    const command = args[0];

    switch (command) {
        case "parse":
            return withFile(args.slice(1), io, (file) => {
                loadProgram(file).statements.forEach((stmt) => io.out(stmt.toString()));
            });
        case "ast":
            return withFile(args.slice(1), io, (file) => {
                io.out(structure(loadProgram(file)));
            });
        case "tokens":
            return withFile(args.slice(1), io, (file) => {
                const source = fs.readFileSync(file, "utf-8");
                for (const tok of tokenize(source)) {
                    io.out(`${tok.line}:${tok.column} ${tok.type} ${JSON.stringify(tok.literal)}`);
                }
            });
        case "check":
            return withFile(args.slice(1), io, (file) => {
                loadProgram(file);
                io.out("ok");
            });
        case "version":
        case "--version":
        case "-v":
            io.out(`rivet ${VERSION}`);
            return 0;
        case "help":
        case "--help":
        case "-h":
        case undefined:
            printUsage(io);
            return 0;
        default:
            io.err(`error: unknown command '${command}'\n`);
            printUsage(io);
            return 1;
    }
}

function main() {
    const args = process.argv.slice(2);
    if (args[0] === "lsp") {
        startServer(process.argv);
        return;
    }
    process.exitCode = run(args);
}

if (require.main === module) {
    main();
}
