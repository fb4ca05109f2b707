import { Lexer } from "../lexer/lexer";
import type { TokenSource } from "../lexer/source";
import { Token, TokenType, isKeyword, lookupIdent } from "../token";
import { ParserFault } from "../errors";
import * as AST from "../ast/ast";
import {
  ParseDiagnostic,
  diagnosticToString,
  expectationDiagnostic,
  faultDiagnostic,
  messageDiagnostic,
} from "./diagnostics";

enum Precedence {
  LOWEST = 1,
  ASSIGN,      // =
  OR,          // or ||
  AND,         // and &&
  EQUALS,      // == !=
  LESSGREATER, // > or <
  RANGE,       // .. ...
  SUM,         // +
  PRODUCT,     // *
  POWER,       // ^
  PREFIX,      // -X or not X
  CALL,        // myFunction(X)
  INDEX,       // array[index]
  DOT,         // object.property
}

const PRECEDENCES: Partial<Record<TokenType, Precedence>> = {
  [TokenType.Assign]: Precedence.ASSIGN,
  [TokenType.Or]: Precedence.OR,
  [TokenType.And]: Precedence.AND,
  [TokenType.EqEq]: Precedence.EQUALS,
  [TokenType.NotEq]: Precedence.EQUALS,
  [TokenType.LT]: Precedence.LESSGREATER,
  [TokenType.GT]: Precedence.LESSGREATER,
  [TokenType.LtEq]: Precedence.LESSGREATER,
  [TokenType.GtEq]: Precedence.LESSGREATER,
  [TokenType.Range]: Precedence.RANGE,
  [TokenType.RangeInclusive]: Precedence.RANGE,
  [TokenType.Plus]: Precedence.SUM,
  [TokenType.Minus]: Precedence.SUM,
  [TokenType.Star]: Precedence.PRODUCT,
  [TokenType.Slash]: Precedence.PRODUCT,
  [TokenType.Percent]: Precedence.PRODUCT,
  [TokenType.Caret]: Precedence.POWER,
  [TokenType.LParen]: Precedence.CALL,
  [TokenType.LBracket]: Precedence.INDEX,
  [TokenType.Dot]: Precedence.DOT,
};

const STATEMENT_STARTS: ReadonlySet<TokenType> = new Set([
  TokenType.Var,
  TokenType.Const,
  TokenType.Fn,
  TokenType.Struct,
  TokenType.Type,
  TokenType.Module,
  TokenType.Using,
  TokenType.Component,
  TokenType.If,
  TokenType.Case,
  TokenType.For,
  TokenType.Check,
  TokenType.Return,
  TokenType.Break,
]);

const TERMINATORS: ReadonlySet<TokenType> = new Set([TokenType.End, TokenType.Else, TokenType.Where]);

const RETURN_STOPS: ReadonlySet<TokenType> = new Set([
  TokenType.End,
  TokenType.Else,
  TokenType.Where,
  TokenType.Semi,
  TokenType.EOF,
]);

const TYPE_NAMES: TokenType[] = [
  TokenType.Identifier,
  TokenType.NumberType,
  TokenType.StringType,
  TokenType.BooleanType,
];

const BINARY_ASSERTIONS: ReadonlySet<TokenType> = new Set([
  TokenType.Is,
  TokenType.IsNot,
  TokenType.IsA,
  TokenType.Contains,
  TokenType.IsGreater,
  TokenType.IsLess,
  TokenType.StartsWith,
  TokenType.EndsWith,
]);

const UNARY_ASSERTIONS: ReadonlySet<TokenType> = new Set([
  TokenType.IsTrue,
  TokenType.IsFalse,
  TokenType.IsEmpty,
]);

// How far expectPeekWithRecovery looks for the missing token.
const RECOVERY_WINDOW = 5;

export const DEFAULT_MAX_DEPTH = 256;

export interface ParserOptions {
  /** Deepest expression and block nesting accepted before the statement is abandoned. */
  maxDepth?: number;
}

type PrefixParseFn = () => AST.Expression | null;
type InfixParseFn = (left: AST.Expression) => AST.Expression | null;

interface Fragment {
  text: string;
  embedded: boolean;
}

/**
 * Splits string text on `#{...}` markers. Returns null when there is nothing
 * to interpolate or when a marker's braces never balance.
 */
function splitInterpolation(text: string): Fragment[] | null {
  if (!text.includes("#{")) return null;

  const fragments: Fragment[] = [];
  let literal = "";
  let i = 0;
  while (i < text.length) {
    if (text.startsWith("#{", i)) {
      let depth = 1;
      let j = i + 2;
      while (j < text.length && depth > 0) {
        if (text[j] === "{") depth++;
        else if (text[j] === "}") depth--;
        j++;
      }
      if (depth > 0) return null;
      if (literal.length > 0) {
        fragments.push({ text: literal, embedded: false });
        literal = "";
      }
      fragments.push({ text: text.slice(i + 2, j - 1), embedded: true });
      i = j;
    } else {
      literal += text[i];
      i++;
    }
  }
  if (literal.length > 0) {
    fragments.push({ text: literal, embedded: false });
  }
  return fragments;
}

function isTypeName(literal: string): boolean {
  return /^[A-Z]/.test(literal);
}

export class Parser {
  private source: TokenSource;
  private curToken: Token;
  private peekToken: Token;
  private diagnostics: ParseDiagnostic[] = [];
  private maxDepth: number;
  private depth: number = 0;
  // Set once the source has failed; every later read yields this EOF.
  private exhausted: Token | null = null;
  // First token of the next statement, when a construct missing its `end`
  // stopped there instead of on its own last token.
  private resumeAt: Token | null = null;

  private prefixParseFns: Partial<Record<TokenType, PrefixParseFn>> = {};
  private infixParseFns: Partial<Record<TokenType, InfixParseFn>> = {};

  constructor(source: TokenSource, options: ParserOptions = {}) {
    this.source = source;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    // Read two tokens, so curToken and peekToken are both set
    this.curToken = this.readToken();
    this.peekToken = this.readToken();

    this.registerPrefix(TokenType.Identifier, this.parseIdentifier.bind(this));
    this.registerPrefix(TokenType.Self, this.parseIdentifier.bind(this));
    this.registerPrefix(TokenType.Number, this.parseNumberLiteral.bind(this));
    this.registerPrefix(TokenType.String, this.parseStringLiteral.bind(this));
    this.registerPrefix(TokenType.True, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.False, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.Nil, this.parseNil.bind(this));
    this.registerPrefix(TokenType.Minus, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.Not, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.LParen, this.parseGroupedExpression.bind(this));
    this.registerPrefix(TokenType.LBracket, this.parseArrayLiteral.bind(this));
    this.registerPrefix(TokenType.LBrace, this.parseMapLiteral.bind(this));
    this.registerPrefix(TokenType.Fn, this.parseFunctionLiteral.bind(this));
    this.registerPrefix(TokenType.Case, this.parseCaseExpression.bind(this));

    this.registerInfix(TokenType.Plus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Minus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Star, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Slash, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Percent, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Caret, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.EqEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.NotEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.And, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Or, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Range, this.parseRangeExpression.bind(this));
    this.registerInfix(TokenType.RangeInclusive, this.parseRangeExpression.bind(this));
    this.registerInfix(TokenType.Assign, this.parseAssignmentExpression.bind(this));
    this.registerInfix(TokenType.LParen, this.parseCallExpression.bind(this));
    this.registerInfix(TokenType.LBracket, this.parseIndexExpression.bind(this));
    this.registerInfix(TokenType.Dot, this.parseDotExpression.bind(this));
  }

  public nextToken() {
    this.curToken = this.peekToken;
    this.peekToken = this.readToken();
  }

  public ParseProgram(): AST.Program {
    const program = new AST.Program();

    while (!this.curTokenIs(TokenType.EOF)) {
      if (this.curTokenIs(TokenType.Semi)) {
        this.nextToken();
        continue;
      }
      if (TERMINATORS.has(this.curToken.type)) {
        this.unexpectedTerminator();
        this.nextToken();
        continue;
      }
      const start = this.curToken;
      const before = this.diagnostics.length;
      const stmt = this.parseStatementWithRecovery();
      if (stmt !== null) {
        program.statements.push(stmt);
      }
      this.advancePast(start, stmt === null && this.diagnostics.length > before);
    }
    return program;
  }

  /**
   * Parses the whole input as exactly one expression. Used for the text
   * embedded in string interpolation.
   */
  public ParseExpression(): AST.Expression | null {
    try {
      const expression = this.parseExpression(Precedence.LOWEST);
      if (expression !== null && !this.peekTokenIs(TokenType.EOF)) {
        this.addError(`unexpected ${this.peekToken.type} after expression`, this.peekToken);
        return null;
      }
      return expression;
    } catch (err) {
      if (!(err instanceof ParserFault)) throw err;
      this.diagnostics.push(faultDiagnostic(err));
      return null;
    }
  }

  public getErrors(): string[] {
    return this.diagnostics.map(diagnosticToString);
  }

  public getDiagnostics(): ParseDiagnostic[] {
    return [...this.diagnostics];
  }

  public hasErrors(): boolean {
    return this.diagnostics.length > 0;
  }

  public formatErrors(): string[] {
    return this.getErrors().map((err, i) => `  ${i + 1}. ${err}`);
  }

  public clearErrors() {
    this.diagnostics = [];
  }

  private readToken(): Token {
    if (this.exhausted !== null) return this.exhausted;
    try {
      let tok = this.source.nextToken();
      while (tok.type === TokenType.Comment) {
        tok = this.source.nextToken();
      }
      return tok;
    } catch (err) {
      if (!(err instanceof ParserFault)) throw err;
      this.diagnostics.push(faultDiagnostic(err));
      this.exhausted = { type: TokenType.EOF, literal: "", line: err.line, column: err.column };
      return this.exhausted;
    }
  }

  // Statements

  private parseStatementWithRecovery(): AST.Statement | null {
    return this.withRecovery(() => this.parseStatement());
  }

  // A fault abandons the current statement only; anything else is a bug and propagates.
  private withRecovery<T>(parse: () => T | null): T | null {
    try {
      return parse();
    } catch (err) {
      if (!(err instanceof ParserFault)) throw err;
      this.diagnostics.push(faultDiagnostic(err));
      this.synchronize();
      return null;
    }
  }

  private parseStatement(): AST.Statement | null {
    switch (this.curToken.type) {
      case TokenType.Var:
      case TokenType.Const:
        return this.parseVarStatement();
      case TokenType.Fn:
        // fn( starts an anonymous function, not a declaration
        if (this.peekTokenIs(TokenType.LParen)) {
          return this.parseExpressionStatement();
        }
        return this.parseFnStatement();
      case TokenType.Struct:
        return this.parseStructStatement();
      case TokenType.Type:
        return this.parseTypeStatement();
      case TokenType.Module:
        return this.parseModuleStatement();
      case TokenType.Using:
        return this.parseUsingStatement();
      case TokenType.Component:
        return this.parseComponentStatement();
      case TokenType.If:
        return this.parseIfStatement();
      case TokenType.Case:
        return this.parseCaseStatement();
      case TokenType.For:
        return this.parseForStatement();
      case TokenType.Check:
        return this.parseCheckStatement();
      case TokenType.Return:
        return this.parseReturnStatement();
      case TokenType.Break:
        return new AST.BreakStatement(this.curToken);
      case TokenType.Comment:
      case TokenType.Where:
      case TokenType.Else:
      case TokenType.End:
        return null;
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseVarStatement(): AST.VarStatement | null {
    const token = this.curToken;
    const constant = token.type === TokenType.Const;
    const context = constant ? "constant name" : "variable name";

    const first = this.expectName(context);
    if (!first) return null;
    const names = [first];
    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      const name = this.expectName(context);
      if (!name) return null;
      names.push(name);
    }

    let type: AST.TypeAnnotation | null = null;
    if (this.peekTokenIs(TokenType.Colon)) {
      this.nextToken();
      type = this.parseTypeAnnotation();
      if (!type) return null;
    }

    if (!this.expectPeek(TokenType.Assign)) return null;
    this.nextToken();

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    if (this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
    }
    return new AST.VarStatement(token, names, type, value, constant);
  }

  private parseFnStatement(): AST.FnStatement | null {
    const token = this.curToken;

    let name = this.expectName("function name");
    if (!name) return null;

    // fn Type.method(...)
    let receiver: AST.TypeAnnotation | null = null;
    if (this.peekTokenIs(TokenType.Dot)) {
      receiver = new AST.TypeAnnotation(name.token, name.value);
      this.nextToken();
      name = this.expectName("method name");
      if (!name) return null;
    }

    if (!this.expectPeek(TokenType.LParen)) return null;
    const parameters = this.parseParameters();
    if (!parameters) return null;

    let returnType: AST.TypeAnnotation | null = null;
    if (this.peekTokenIs(TokenType.Colon)) {
      this.nextToken();
      returnType = this.parseTypeAnnotation();
      if (!returnType) return null;
    }

    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    const body = this.parseBlockStatement([TokenType.Where, TokenType.End]);

    let where: AST.WhereBlock | null = null;
    if (this.curTokenIs(TokenType.Where)) {
      const whereToken = this.curToken;
      if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
      const items = this.parseAssertionBlock();
      where = new AST.WhereBlock(whereToken, items.statements, items.assertions);
    }

    return new AST.FnStatement(token, name, receiver, parameters, returnType, body, where);
  }

  private parseStructStatement(): AST.StructStatement | null {
    const token = this.curToken;
    const name = this.expectName("struct name");
    if (!name) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    this.nextToken();

    const fields: AST.StructField[] = [];
    while (!this.curTokenIs(TokenType.End)) {
      if (this.curTokenIs(TokenType.EOF)) {
        this.diagnostics.push(expectationDiagnostic(this.curToken, [TokenType.End]));
        break;
      }
      if (this.curTokenIs(TokenType.Comma) || this.curTokenIs(TokenType.Semi)) {
        this.nextToken();
        continue;
      }
      // `fn: T` is a (reserved) field name; `fn f` is the next declaration
      if (STATEMENT_STARTS.has(this.curToken.type) && !this.peekTokenIs(TokenType.Colon)) {
        this.diagnostics.push(expectationDiagnostic(this.curToken, [TokenType.End]));
        this.resumeAt = this.curToken;
        break;
      }

      const field = this.parseStructField();
      if (field) {
        fields.push(field);
        this.nextToken();
      } else {
        this.skipToEnd();
      }
    }

    return new AST.StructStatement(token, name, fields);
  }

  private parseStructField(): AST.StructField | null {
    const token = this.curToken;
    if (!this.curTokenIs(TokenType.Identifier) && !isKeyword(token)) {
      this.diagnostics.push(expectationDiagnostic(token, [TokenType.Identifier, TokenType.End]));
      return null;
    }
    this.validateIdentifier(token, "struct field");
    if (!this.expectPeek(TokenType.Colon)) return null;
    const type = this.parseTypeAnnotation();
    if (!type) return null;
    return new AST.StructField(token, new AST.Identifier(token, token.literal), type);
  }

  private parseTypeStatement(): AST.TypeStatement | null {
    const token = this.curToken;
    const name = this.expectName("type name");
    if (!name) return null;
    if (!this.expectPeek(TokenType.Assign)) return null;
    const type = this.parseTypeAnnotation();
    if (!type) return null;
    return new AST.TypeStatement(token, name, type);
  }

  private parseModuleStatement(): AST.ModuleStatement | null {
    const token = this.curToken;
    const name = this.expectName("module name");
    if (!name) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    const body = this.parseBlockStatement([TokenType.End]);
    return new AST.ModuleStatement(token, name, body);
  }

  private parseUsingStatement(): AST.UsingStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.String)) return null;
    const path = new AST.StringLiteral(this.curToken, this.curToken.literal);

    let alias: AST.Identifier | null = null;
    if (this.peekTokenIs(TokenType.As)) {
      this.nextToken();
      alias = this.expectName("module alias");
      if (!alias) return null;
    }
    return new AST.UsingStatement(token, path, alias);
  }

  private parseComponentStatement(): AST.ComponentStatement | null {
    const token = this.curToken;
    const name = this.expectName("component name");
    if (!name) return null;
    if (!this.expectPeek(TokenType.LParen)) return null;
    const parameters = this.parseParameters();
    if (!parameters) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;

    const block = this.parseBlockStatement([TokenType.End]);
    const statements: AST.Statement[] = [];
    let root: AST.UIElement | null = null;
    for (const stmt of block.statements) {
      if (stmt instanceof AST.ExpressionStatement && stmt.expression instanceof AST.UIElement) {
        if (root === null) {
          root = stmt.expression;
          continue;
        }
        this.addError(`component '${name.value}' already has a root element`, stmt.token);
      }
      statements.push(stmt);
    }
    if (root === null) {
      this.addError(`component '${name.value}' has no root element`, name.token);
    }

    return new AST.ComponentStatement(token, name, parameters, new AST.ComponentBody(block.token, statements, root));
  }

  private parseIfStatement(): AST.IfStatement | null {
    const token = this.curToken;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;

    const consequence = this.parseBlockStatement([TokenType.Else, TokenType.End]);
    const alternatives: AST.ElseIfClause[] = [];
    let alternative: AST.BlockStatement | null = null;

    // one 'end' closes the whole chain
    while (this.curTokenIs(TokenType.Else)) {
      const elseToken = this.curToken;
      if (this.peekTokenIs(TokenType.If)) {
        this.nextToken();
        this.nextToken();
        const elseCondition = this.parseExpression(Precedence.LOWEST);
        if (!elseCondition) return null;
        if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
        const block = this.parseBlockStatement([TokenType.Else, TokenType.End]);
        alternatives.push(new AST.ElseIfClause(elseToken, elseCondition, block));
      } else {
        if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
        alternative = this.parseBlockStatement([TokenType.End]);
      }
    }

    return new AST.IfStatement(token, condition, consequence, alternatives, alternative);
  }

  private parseCaseStatement(): AST.CaseStatement | null {
    const token = this.curToken;
    this.nextToken();
    const subject = this.parseExpression(Precedence.LOWEST);
    if (!subject) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    return new AST.CaseStatement(token, subject, this.parseCaseBranches());
  }

  private parseForStatement(): AST.ForStatement | null {
    const token = this.curToken;
    const first = this.expectName("loop variable");
    if (!first) return null;

    let index: AST.Identifier | null = null;
    let variable = first;
    if (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      const second = this.expectName("loop variable");
      if (!second) return null;
      index = first;
      variable = second;
    }

    if (!this.expectPeek(TokenType.In)) return null;
    this.nextToken();
    const iterable = this.parseExpression(Precedence.LOWEST);
    if (!iterable) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;

    const body = this.parseBlockStatement([TokenType.End]);
    return new AST.ForStatement(token, index, variable, iterable, body);
  }

  private parseCheckStatement(): AST.CheckStatement | null {
    const token = this.curToken;
    let label: string | null = null;
    if (this.peekTokenIs(TokenType.String)) {
      this.nextToken();
      label = this.curToken.literal;
    }
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    const items = this.parseAssertionBlock();
    return new AST.CheckStatement(token, label, items.statements, items.assertions);
  }

  private parseReturnStatement(): AST.ReturnStatement | null {
    const token = this.curToken;
    const values: AST.Expression[] = [];
    if (RETURN_STOPS.has(this.peekToken.type)) {
      return new AST.ReturnStatement(token, values);
    }

    this.nextToken();
    const first = this.parseExpression(Precedence.LOWEST);
    if (!first) return null;
    values.push(first);
    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      this.nextToken();
      const value = this.parseExpression(Precedence.LOWEST);
      if (!value) return null;
      values.push(value);
    }

    if (this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
    }
    return new AST.ReturnStatement(token, values);
  }

  private parseExpressionStatement(): AST.ExpressionStatement | null {
    const token = this.curToken;
    const expression = this.parseExpression(Precedence.LOWEST);
    if (!expression) return null;

    if (this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
    }
    return new AST.ExpressionStatement(token, expression);
  }

  /**
   * Parses statements after the `::` under curToken until one of the given
   * terminators, which is left in curToken. A block cut short by EOF is
   * still returned.
   */
  private parseBlockStatement(terminators: TokenType[]): AST.BlockStatement {
    const block = new AST.BlockStatement(this.curToken);
    return this.nested(() => {
      this.nextToken();
      while (!terminators.includes(this.curToken.type)) {
        if (this.curTokenIs(TokenType.EOF)) {
          this.diagnostics.push(expectationDiagnostic(this.curToken, terminators));
          break;
        }
        if (this.curTokenIs(TokenType.Semi)) {
          this.nextToken();
          continue;
        }
        if (TERMINATORS.has(this.curToken.type)) {
          this.unexpectedTerminator();
          this.nextToken();
          continue;
        }

        const start = this.curToken;
        const before = this.diagnostics.length;
        const stmt = this.parseStatementWithRecovery();
        if (stmt !== null) {
          block.statements.push(stmt);
        }
        this.advancePast(start, stmt === null && this.diagnostics.length > before);
      }
      return block;
    });
  }

  /**
   * Items of a check or where block: setup statements and assertions, up to
   * the closing `end`.
   */
  private parseAssertionBlock(): { statements: AST.Statement[]; assertions: AST.Assertion[] } {
    const statements: AST.Statement[] = [];
    const assertions: AST.Assertion[] = [];
    return this.nested(() => {
      this.nextToken();
      while (!this.curTokenIs(TokenType.End)) {
        if (this.curTokenIs(TokenType.EOF)) {
          this.diagnostics.push(expectationDiagnostic(this.curToken, [TokenType.End]));
          break;
        }
        if (this.curTokenIs(TokenType.Semi)) {
          this.nextToken();
          continue;
        }
        if (TERMINATORS.has(this.curToken.type)) {
          this.unexpectedTerminator();
          this.nextToken();
          continue;
        }

        const start = this.curToken;
        const before = this.diagnostics.length;
        const item = this.withRecovery(() => this.parseAssertionItem());
        if (item instanceof AST.Assertion) {
          assertions.push(item);
        } else if (item !== null) {
          statements.push(item);
        }
        this.advancePast(start, item === null && this.diagnostics.length > before);
      }
      return { statements, assertions };
    });
  }

  private parseAssertionItem(): AST.Statement | AST.Assertion | null {
    const isAnonymousFn = this.curTokenIs(TokenType.Fn) && this.peekTokenIs(TokenType.LParen);
    if (STATEMENT_STARTS.has(this.curToken.type) && !isAnonymousFn) {
      return this.parseStatement();
    }

    const token = this.curToken;
    const left = this.parseExpression(Precedence.LOWEST);
    if (!left) return null;

    const opType = this.peekToken.type;
    if (!BINARY_ASSERTIONS.has(opType) && !UNARY_ASSERTIONS.has(opType) && opType !== TokenType.Raises) {
      if (this.peekTokenIs(TokenType.Semi)) {
        this.nextToken();
      }
      return new AST.ExpressionStatement(token, left);
    }

    this.nextToken();
    const operator = this.curToken.literal;
    if (UNARY_ASSERTIONS.has(opType)) {
      return new AST.Assertion(token, left, operator, null);
    }
    if (opType === TokenType.Raises) {
      // the expected message is optional
      if (!this.peekTokenIs(TokenType.String)) {
        return new AST.Assertion(token, left, operator, null);
      }
      this.nextToken();
      const message = this.parseStringLiteral();
      if (!message) {
        this.skipToEnd();
        return null;
      }
      return new AST.Assertion(token, left, operator, message);
    }

    this.nextToken();
    const right = this.parseExpression(Precedence.LOWEST);
    if (!right) {
      this.skipToEnd();
      return null;
    }
    return new AST.Assertion(token, left, operator, right);
  }

  private parseCaseBranches(): AST.CaseBranch[] {
    const branches: AST.CaseBranch[] = [];
    return this.nested(() => {
      this.nextToken();
      while (!this.curTokenIs(TokenType.End)) {
        if (this.curTokenIs(TokenType.EOF)) {
          this.diagnostics.push(expectationDiagnostic(this.curToken, [TokenType.End]));
          break;
        }
        if (this.curTokenIs(TokenType.Semi)) {
          this.nextToken();
          continue;
        }

        const token = this.curToken;
        const pattern = this.parseExpression(Precedence.LOWEST);
        if (!pattern || !this.expectPeek(TokenType.Arrow)) {
          this.skipToEnd();
          continue;
        }
        this.nextToken();
        const result = this.parseExpression(Precedence.LOWEST);
        if (!result) {
          this.skipToEnd();
          continue;
        }
        branches.push(new AST.CaseBranch(token, pattern, result));
        this.nextToken();
      }
      return branches;
    });
  }

  /** Parameters after the `(` under curToken, through the closing `)`. */
  private parseParameters(): AST.Parameter[] | null {
    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return [];
    }
    const first = this.expectName("parameter name");
    if (!first) return null;
    return this.parseParameterList(first);
  }

  // curToken is the first parameter's name
  private parseParameterList(first: AST.Identifier): AST.Parameter[] | null {
    const parameters: AST.Parameter[] = [];
    let name = first;
    for (;;) {
      let type: AST.TypeAnnotation | null = null;
      if (this.peekTokenIs(TokenType.Colon)) {
        this.nextToken();
        type = this.parseTypeAnnotation();
        if (!type) return null;
      }
      parameters.push(new AST.Parameter(name.token, name, type));
      if (!this.peekTokenIs(TokenType.Comma)) break;
      this.nextToken();
      const next = this.expectName("parameter name");
      if (!next) return null;
      name = next;
    }
    if (!this.expectPeek(TokenType.RParen)) return null;
    return parameters;
  }

  /** The type that follows curToken, e.g. `number` or `Map[String, Array[User]]`. */
  private parseTypeAnnotation(): AST.TypeAnnotation | null {
    return this.nested(() => {
      if (!this.expectPeekOneOf(TYPE_NAMES)) return null;
      const token = this.curToken;
      const parameters: AST.TypeAnnotation[] = [];
      if (this.peekTokenIs(TokenType.LBracket)) {
        this.nextToken();
        for (;;) {
          const param = this.parseTypeAnnotation();
          if (!param) return null;
          parameters.push(param);
          if (!this.peekTokenIs(TokenType.Comma)) break;
          this.nextToken();
        }
        if (!this.expectPeek(TokenType.RBracket)) return null;
      }
      return new AST.TypeAnnotation(token, token.literal, parameters);
    });
  }

  // Expressions

  private parseExpression(precedence: Precedence): AST.Expression | null {
    return this.nested(() => {
      const prefix = this.prefixParseFns[this.curToken.type];
      if (!prefix) {
        this.noPrefixParseFnError(this.curToken);
        return null;
      }
      const left = prefix();
      if (!left) return null;
      return this.parseInfixChain(left, precedence);
    });
  }

  private parseInfixChain(left: AST.Expression, precedence: Precedence): AST.Expression | null {
    let leftExp = left;
    while (!this.peekTokenIs(TokenType.Semi) && precedence < this.peekPrecedence()) {
      const infix = this.infixParseFns[this.peekToken.type];
      if (!infix) {
        return leftExp;
      }
      this.nextToken();
      const next = infix(leftExp);
      if (!next) return null;
      leftExp = next;
    }
    return leftExp;
  }

  private parseIdentifier(): AST.Expression | null {
    if (isTypeName(this.curToken.literal) && this.peekTokenIs(TokenType.LBrace)) {
      return this.parseUIElement();
    }
    return new AST.Identifier(this.curToken, this.curToken.literal);
  }

  private parseNumberLiteral(): AST.Expression | null {
    const value = Number(this.curToken.literal);
    if (Number.isNaN(value)) {
      this.addError(`could not parse ${this.curToken.literal} as number`, this.curToken);
      return null;
    }
    return new AST.NumberLiteral(this.curToken, value);
  }

  private parseStringLiteral(): AST.Expression | null {
    const token = this.curToken;
    const fragments = splitInterpolation(token.literal);
    if (fragments === null) {
      return new AST.StringLiteral(token, token.literal);
    }

    const parts: AST.Expression[] = [];
    for (const fragment of fragments) {
      if (!fragment.embedded) {
        parts.push(new AST.StringLiteral(token, fragment.text));
        continue;
      }
      const expression = this.parseEmbeddedExpression(token, fragment.text);
      if (!expression) return null;
      parts.push(expression);
    }

    if (parts.length === 1 && parts[0] instanceof AST.StringLiteral) {
      return parts[0];
    }
    return new AST.InterpolatedString(token, parts);
  }

  private parseEmbeddedExpression(token: Token, text: string): AST.Expression | null {
    const parser = new Parser(new Lexer(text), { maxDepth: this.maxDepth });
    const expression = parser.ParseExpression();
    for (const d of parser.getDiagnostics()) {
      this.addError(`in string interpolation: ${d.message}`, token);
    }
    return parser.hasErrors() ? null : expression;
  }

  private parseBoolean(): AST.Expression {
    return new AST.BooleanLiteral(this.curToken, this.curTokenIs(TokenType.True));
  }

  private parseNil(): AST.Expression {
    return new AST.NilLiteral(this.curToken);
  }

  private parsePrefixExpression(): AST.Expression | null {
    const token = this.curToken;
    this.nextToken();
    const right = this.parseExpression(Precedence.PREFIX);
    if (!right) return null;
    return new AST.PrefixExpression(token, token.literal, right);
  }

  private parseInfixExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    const precedence = this.curPrecedence();
    this.nextToken();
    const right = this.parseExpression(precedence);
    if (!right) return null;
    return new AST.InfixExpression(token, left, token.literal, right);
  }

  private parseRangeExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    const precedence = this.curPrecedence();
    this.nextToken();
    const end = this.parseExpression(precedence);
    if (!end) return null;
    return new AST.RangeExpression(token, left, end, token.type === TokenType.RangeInclusive);
  }

  private parseAssignmentExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    this.nextToken();
    // right side at LOWEST: a = b = c assigns right to left
    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    if (
      !(left instanceof AST.Identifier) &&
      !(left instanceof AST.DotExpression) &&
      !(left instanceof AST.IndexExpression)
    ) {
      this.addError(`invalid assignment target: ${left.toString()}`, token);
      return null;
    }
    return new AST.AssignmentExpression(token, left, value);
  }

  private parseGroupedExpression(): AST.Expression | null {
    this.nextToken();
    const exp = this.parseExpression(Precedence.LOWEST);
    if (!exp) return null;
    if (!this.expectPeek(TokenType.RParen)) return null;
    return exp;
  }

  private parseArrayLiteral(): AST.Expression | null {
    const token = this.curToken;
    const elements = this.parseExpressionList(TokenType.RBracket);
    if (!elements) return null;
    return new AST.ArrayLiteral(token, elements);
  }

  private parseMapLiteral(): AST.Expression | null {
    const token = this.curToken;
    const pairs: AST.MapPair[] = [];

    while (!this.peekTokenIs(TokenType.RBrace)) {
      this.nextToken();
      const key = this.parseExpression(Precedence.LOWEST);
      if (!key) return null;
      if (!this.expectPeek(TokenType.Colon)) return null;
      this.nextToken();
      const value = this.parseExpression(Precedence.LOWEST);
      if (!value) return null;
      pairs.push(new AST.MapPair(key.token, key, value));

      if (!this.peekTokenIs(TokenType.RBrace) && !this.expectPeek(TokenType.Comma)) return null;
    }
    this.nextToken();
    return new AST.MapLiteral(token, pairs);
  }

  private parseFunctionLiteral(): AST.Expression | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.LParen)) return null;
    const parameters = this.parseParameters();
    if (!parameters) return null;
    return this.parseFunctionBody(token, parameters);
  }

  private parseFunctionBody(token: Token, parameters: AST.Parameter[]): AST.FunctionLiteral | null {
    if (!this.expectPeek(TokenType.DoubleColon)) return null;
    const body = this.parseBlockStatement([TokenType.End]);
    return new AST.FunctionLiteral(token, parameters, body);
  }

  private parseCaseExpression(): AST.Expression | null {
    const token = this.curToken;
    this.nextToken();
    const subject = this.parseExpression(Precedence.LOWEST);
    if (!subject) return null;
    if (!this.expectPeekWithRecovery(TokenType.DoubleColon)) return null;
    return new AST.CaseExpression(token, subject, this.parseCaseBranches());
  }

  private parseCallExpression(fn: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    const args: AST.Expression[] = [];

    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return new AST.CallExpression(token, fn, args);
    }

    this.nextToken();
    const first = this.parseCallArgument();
    if (!first) return null;
    args.push(first);
    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      this.nextToken();
      const arg = this.parseCallArgument();
      if (!arg) return null;
      args.push(arg);
    }

    if (!this.expectPeek(TokenType.RParen)) return null;
    return new AST.CallExpression(token, fn, args);
  }

  private parseCallArgument(): AST.Expression | null {
    if (this.curTokenIs(TokenType.LParen)) {
      return this.parseParenthesizedArgument();
    }
    return this.parseExpression(Precedence.LOWEST);
  }

  /**
   * An argument that opens with `(` is either a bare function literal,
   * `(x, y) :: body end`, or an ordinary parenthesised expression.
   */
  private parseParenthesizedArgument(): AST.Expression | null {
    const open = this.curToken;

    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return this.parseFunctionBody(open, []);
    }
    if (!this.peekTokenIs(TokenType.Identifier)) {
      return this.parseExpression(Precedence.LOWEST);
    }

    this.nextToken();
    const first = this.parseIdentifier();
    if (!first) return null;

    if (first instanceof AST.Identifier) {
      if (this.peekTokenIs(TokenType.Colon) || this.peekTokenIs(TokenType.Comma)) {
        const parameters = this.parseParameterList(first);
        if (!parameters) return null;
        return this.parseFunctionBody(open, parameters);
      }
      if (this.peekTokenIs(TokenType.RParen)) {
        this.nextToken();
        if (this.peekTokenIs(TokenType.DoubleColon)) {
          return this.parseFunctionBody(open, [new AST.Parameter(first.token, first, null)]);
        }
        return this.parseInfixChain(first, Precedence.LOWEST);
      }
    }

    const inner = this.parseInfixChain(first, Precedence.LOWEST);
    if (!inner) return null;
    if (!this.expectPeek(TokenType.RParen)) return null;
    return this.parseInfixChain(inner, Precedence.LOWEST);
  }

  private parseIndexExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    this.nextToken();
    const index = this.parseExpression(Precedence.LOWEST);
    if (!index) return null;
    if (!this.expectPeek(TokenType.RBracket)) return null;
    return new AST.IndexExpression(token, left, index);
  }

  private parseDotExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    // keywords are fine as property names: list.contains(x), user.type
    if (!this.peekTokenIs(TokenType.Identifier) && !isKeyword(this.peekToken)) {
      this.addError(`expected property name, got ${this.peekToken.type} instead`, this.peekToken);
      return null;
    }
    this.nextToken();
    const property = new AST.Identifier(this.curToken, this.curToken.literal);
    return new AST.DotExpression(token, left, property);
  }

  private parseUIElement(): AST.UIElement | null {
    const token = this.curToken;
    const type = new AST.Identifier(token, token.literal);
    const properties = new Map<string, AST.Expression>();
    const children: AST.UIElement[] = [];

    return this.nested(() => {
      this.nextToken(); // '{'
      this.nextToken();
      while (!this.curTokenIs(TokenType.RBrace)) {
        if (this.curTokenIs(TokenType.Comma) || this.curTokenIs(TokenType.Semi)) {
          this.nextToken();
          continue;
        }

        const nameToken = this.curToken;
        const isName = this.curTokenIs(TokenType.Identifier) || isKeyword(this.curToken);
        if (this.curTokenIs(TokenType.Identifier) && isTypeName(nameToken.literal) && this.peekTokenIs(TokenType.LBrace)) {
          const child = this.parseUIElement();
          if (!child) return null;
          children.push(child);
        } else if (isName && this.peekTokenIs(TokenType.Colon)) {
          this.nextToken();
          this.nextToken();
          const value = this.parseExpression(Precedence.LOWEST);
          if (!value) return null;
          if (properties.has(nameToken.literal)) {
            this.addError(`duplicate property '${nameToken.literal}'`, nameToken);
          } else {
            properties.set(nameToken.literal, value);
          }
        } else {
          this.diagnostics.push(expectationDiagnostic(this.curToken, [TokenType.Identifier, TokenType.RBrace]));
          return null;
        }
        this.nextToken();
      }
      return new AST.UIElement(token, type, properties, children);
    });
  }

  private parseExpressionList(end: TokenType): AST.Expression[] | null {
    const list: AST.Expression[] = [];

    if (this.peekTokenIs(end)) {
      this.nextToken();
      return list;
    }

    this.nextToken();
    const first = this.parseExpression(Precedence.LOWEST);
    if (!first) return null;
    list.push(first);

    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      // trailing comma
      if (this.peekTokenIs(end)) break;
      this.nextToken();
      const item = this.parseExpression(Precedence.LOWEST);
      if (!item) return null;
      list.push(item);
    }

    if (!this.expectPeek(end)) return null;
    return list;
  }

  // Recovery

  /**
   * Moves past the statement that began at `start`. After a failure the
   * tokens up to the next statement are dropped, unless the failure already
   * stopped on the first token of the next statement. A statement that ended
   * early at `resumeAt` is not advanced past either.
   */
  private advancePast(start: Token, failed: boolean) {
    if (this.resumeAt !== null && this.resumeAt === this.curToken) {
      this.resumeAt = null;
      return;
    }
    if (failed && this.curToken !== start && this.atStatementBoundary()) {
      return;
    }
    this.nextToken();
    if (failed) {
      this.skipToNextStatement();
    }
  }

  private atStatementBoundary(): boolean {
    const type = this.curToken.type;
    return STATEMENT_STARTS.has(type) || TERMINATORS.has(type) || type === TokenType.EOF;
  }

  /** Advance until the next token starts a statement or ends a block. */
  private synchronize() {
    while (
      !this.peekTokenIs(TokenType.EOF) &&
      !STATEMENT_STARTS.has(this.peekToken.type) &&
      !TERMINATORS.has(this.peekToken.type)
    ) {
      this.nextToken();
    }
  }

  private skipToEnd() {
    while (!this.curTokenIs(TokenType.End) && !this.curTokenIs(TokenType.EOF)) {
      this.nextToken();
    }
  }

  private skipToNextStatement() {
    while (!this.atStatementBoundary()) {
      this.nextToken();
    }
  }

  private expectPeekWithRecovery(t: TokenType): boolean {
    if (this.peekTokenIs(t)) {
      this.nextToken();
      return true;
    }
    this.peekError(t);
    // the token may just be a few tokens late: fn f() x :: ... end
    for (let i = 1; i < RECOVERY_WINDOW; i++) {
      if (this.peekTokenIs(TokenType.EOF)) return false;
      this.nextToken();
      if (this.peekTokenIs(t)) {
        this.nextToken();
        return true;
      }
    }
    return false;
  }

  /** Records an error when `token` is a reserved word. */
  private validateIdentifier(token: Token, context: string) {
    if (lookupIdent(token.literal) !== TokenType.Identifier) {
      this.addError(`'${token.literal}' is a reserved word (in ${context})`, token);
    }
  }

  /** A name in a declaring position, read from peekToken. */
  private expectName(context: string): AST.Identifier | null {
    if (this.peekTokenIs(TokenType.Identifier)) {
      this.nextToken();
      return new AST.Identifier(this.curToken, this.curToken.literal);
    }
    if (isKeyword(this.peekToken)) {
      // reported, then read as the name so the rest of the statement still parses
      this.nextToken();
      this.validateIdentifier(this.curToken, context);
      return new AST.Identifier(this.curToken, this.curToken.literal);
    }
    this.peekError(TokenType.Identifier);
    return null;
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw new ParserFault(
        `maximum nesting depth of ${this.maxDepth} exceeded`,
        this.curToken.line,
        this.curToken.column,
      );
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private registerPrefix(tokenType: TokenType, fn: PrefixParseFn) {
    this.prefixParseFns[tokenType] = fn;
  }

  private registerInfix(tokenType: TokenType, fn: InfixParseFn) {
    this.infixParseFns[tokenType] = fn;
  }

  private curTokenIs(t: TokenType): boolean {
    return this.curToken.type === t;
  }

  private peekTokenIs(t: TokenType): boolean {
    return this.peekToken.type === t;
  }

  private expectPeek(t: TokenType): boolean {
    return this.expectPeekOneOf([t]);
  }

  private expectPeekOneOf(types: TokenType[]): boolean {
    if (types.includes(this.peekToken.type)) {
      this.nextToken();
      return true;
    }
    this.peekError(...types);
    return false;
  }

  private peekPrecedence(): Precedence {
    return PRECEDENCES[this.peekToken.type] ?? Precedence.LOWEST;
  }

  private curPrecedence(): Precedence {
    return PRECEDENCES[this.curToken.type] ?? Precedence.LOWEST;
  }

  private peekError(...expected: TokenType[]) {
    this.diagnostics.push(expectationDiagnostic(this.peekToken, expected));
  }

  private noPrefixParseFnError(token: Token) {
    this.addError(`no prefix parse function for ${token.type} found`, token);
  }

  private unexpectedTerminator() {
    this.addError(`unexpected '${this.curToken.literal}'`, this.curToken);
  }

  private addError(message: string, token: Token) {
    this.diagnostics.push(messageDiagnostic(message, token));
  }
}
