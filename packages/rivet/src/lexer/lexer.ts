import { Token, TokenType, lookupIdent } from "../token";
import type { TokenSource } from "./source";

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "0": "\0",
};

export class Lexer implements TokenSource {
  private input: string;
  private position: number = 0; // current position in input (points to current char)
  private readPosition: number = 0; // current reading position in input (after current char)
  private ch: string | null = null; // current char under examination
  private line: number = 1;
  private column: number = 0;

  constructor(input: string) {
    this.input = input;
    this.readChar();
  }

  public nextToken(): Token {
    this.skipWhitespace();

    let tok: Token;
    const line = this.line;
    const col = this.column;

    if (this.ch === null) {
      return { type: TokenType.EOF, literal: "", line, column: col };
    }

    switch (this.ch) {
      case "=":
        if (this.peekChar() === "=") {
          this.readChar();
          tok = { type: TokenType.EqEq, literal: "==", line, column: col };
        } else if (this.peekChar() === ">") {
          this.readChar();
          tok = { type: TokenType.Arrow, literal: "=>", line, column: col };
        } else {
          tok = { type: TokenType.Assign, literal: this.ch, line, column: col };
        }
        break;
      case "!":
        if (this.peekChar() === "=") {
          this.readChar();
          tok = { type: TokenType.NotEq, literal: "!=", line, column: col };
        } else {
          tok = { type: TokenType.Not, literal: this.ch, line, column: col };
        }
        break;
      case ";":
        tok = { type: TokenType.Semi, literal: this.ch, line, column: col };
        break;
      case ":":
        if (this.peekChar() === ":") {
          this.readChar();
          tok = { type: TokenType.DoubleColon, literal: "::", line, column: col };
        } else {
          tok = { type: TokenType.Colon, literal: this.ch, line, column: col };
        }
        break;
      case ".":
        if (this.peekChar() === "." && this.input[this.readPosition + 1] === ".") {
          this.readChar();
          this.readChar();
          tok = { type: TokenType.RangeInclusive, literal: "...", line, column: col };
        } else if (this.peekChar() === ".") {
          this.readChar();
          tok = { type: TokenType.Range, literal: "..", line, column: col };
        } else {
          tok = { type: TokenType.Dot, literal: this.ch, line, column: col };
        }
        break;
      case ",":
        tok = { type: TokenType.Comma, literal: this.ch, line, column: col };
        break;
      case "(":
        tok = { type: TokenType.LParen, literal: this.ch, line, column: col };
        break;
      case ")":
        tok = { type: TokenType.RParen, literal: this.ch, line, column: col };
        break;
      case "{":
        tok = { type: TokenType.LBrace, literal: this.ch, line, column: col };
        break;
      case "}":
        tok = { type: TokenType.RBrace, literal: this.ch, line, column: col };
        break;
      case "[":
        tok = { type: TokenType.LBracket, literal: this.ch, line, column: col };
        break;
      case "]":
        tok = { type: TokenType.RBracket, literal: this.ch, line, column: col };
        break;
      case "+":
        tok = { type: TokenType.Plus, literal: this.ch, line, column: col };
        break;
      case "-":
        if (this.peekChar() === ">") {
          this.readChar();
          tok = { type: TokenType.TypeArrow, literal: "->", line, column: col };
        } else {
          tok = { type: TokenType.Minus, literal: this.ch, line, column: col };
        }
        break;
      case "*":
        tok = { type: TokenType.Star, literal: this.ch, line, column: col };
        break;
      case "/":
        tok = { type: TokenType.Slash, literal: this.ch, line, column: col };
        break;
      case "%":
        tok = { type: TokenType.Percent, literal: this.ch, line, column: col };
        break;
      case "^":
        tok = { type: TokenType.Caret, literal: this.ch, line, column: col };
        break;
      case "<":
        if (this.peekChar() === "=") {
          this.readChar();
          tok = { type: TokenType.LtEq, literal: "<=", line, column: col };
        } else {
          tok = { type: TokenType.LT, literal: this.ch, line, column: col };
        }
        break;
      case ">":
        if (this.peekChar() === "=") {
          this.readChar();
          tok = { type: TokenType.GtEq, literal: ">=", line, column: col };
        } else {
          tok = { type: TokenType.GT, literal: this.ch, line, column: col };
        }
        break;
      case "&":
        if (this.peekChar() === "&") {
          this.readChar();
          tok = { type: TokenType.And, literal: "&&", line, column: col };
        } else {
          tok = { type: TokenType.Illegal, literal: this.ch, line, column: col };
        }
        break;
      case "|":
        if (this.peekChar() === "|") {
          this.readChar();
          tok = { type: TokenType.Or, literal: "||", line, column: col };
        } else {
          tok = { type: TokenType.Illegal, literal: this.ch, line, column: col };
        }
        break;
      case "#": {
        // readComment stops on the newline or past the closing |#
        const literal = this.peekChar() === "|" ? this.readBlockComment() : this.readComment();
        return { type: TokenType.Comment, literal, line, column: col };
      }
      case '"': {
        const { value, terminated } = this.readString();
        return { type: terminated ? TokenType.String : TokenType.Illegal, literal: value, line, column: col };
      }
      default:
        if (this.isLetter(this.ch)) {
          const literal = this.readIdentifier();
          return { type: lookupIdent(literal), literal, line, column: col };
        } else if (this.isDigit(this.ch)) {
          return { type: TokenType.Number, literal: this.readNumber(), line, column: col };
        } else {
          tok = { type: TokenType.Illegal, literal: this.ch, line, column: col };
        }
    }

    this.readChar();
    return tok;
  }

  private readChar() {
    if (this.ch === "\n") {
      this.line += 1;
      this.column = 0;
    }
    if (this.readPosition >= this.input.length) {
      this.ch = null;
    } else {
      this.ch = this.input[this.readPosition];
    }
    this.position = this.readPosition;
    this.readPosition += 1;
    this.column += 1;
  }

  private peekChar(): string | null {
    if (this.readPosition >= this.input.length) {
      return null;
    } else {
      return this.input[this.readPosition];
    }
  }

  private readIdentifier(): string {
    const position = this.position;
    while (this.ch !== null && (this.isLetter(this.ch) || this.isDigit(this.ch))) {
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  private readNumber(): string {
    const position = this.position;
    while (this.ch !== null && this.isDigit(this.ch)) {
      this.readChar();
    }
    // '.' followed by a digit is a fraction; '..' stays a range operator
    const next = this.peekChar();
    if (this.ch === "." && next !== null && this.isDigit(next)) {
      this.readChar(); // consume '.'
      while (this.ch !== null && this.isDigit(this.ch)) {
        this.readChar();
      }
    }
    return this.input.slice(position, this.position);
  }

  private readString(): { value: string; terminated: boolean } {
    let value = "";
    this.readChar(); // opening quote
    while (this.ch !== null && this.ch !== '"') {
      if (this.ch === "\\") {
        const escaped = this.peekChar();
        this.readChar();
        if (escaped === null) break;
        value += Object.prototype.hasOwnProperty.call(ESCAPES, escaped) ? ESCAPES[escaped] : "\\" + escaped;
      } else {
        value += this.ch;
      }
      this.readChar();
    }
    if (this.ch === null) {
      return { value, terminated: false };
    }
    this.readChar(); // closing quote
    return { value, terminated: true };
  }

  private readComment(): string {
    const position = this.position;
    while (this.ch !== null && this.ch !== "\n") {
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  private readBlockComment(): string {
    const position = this.position;
    this.readChar(); // '#'
    this.readChar(); // '|'
    let depth = 1;
    while (this.ch !== null && depth > 0) {
      if (this.ch === "#" && this.peekChar() === "|") {
        depth++;
        this.readChar();
      } else if (this.ch === "|" && this.peekChar() === "#") {
        depth--;
        this.readChar();
      }
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  private skipWhitespace() {
    while (this.ch === " " || this.ch === "\t" || this.ch === "\n" || this.ch === "\r") {
      this.readChar();
    }
  }

  private isLetter(ch: string): boolean {
    return ("a" <= ch && ch <= "z") || ("A" <= ch && ch <= "Z") || ch === "_";
  }

  private isDigit(ch: string): boolean {
    return "0" <= ch && ch <= "9";
  }
}

/**
 * Scan a whole source text, including the trailing EOF token.
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const tok = lexer.nextToken();
    tokens.push(tok);
    if (tok.type === TokenType.EOF) return tokens;
  }
}
