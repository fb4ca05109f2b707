import type { Token } from "../token";

export interface Node {
  readonly kind: string;
  token: Token;
  tokenLiteral(): string;
  toString(): string;
}

export type Statement =
  | VarStatement
  | FnStatement
  | StructStatement
  | TypeStatement
  | ModuleStatement
  | UsingStatement
  | ComponentStatement
  | IfStatement
  | CaseStatement
  | ForStatement
  | CheckStatement
  | ReturnStatement
  | BreakStatement
  | ExpressionStatement
  | BlockStatement;

export type Expression =
  | Identifier
  | NumberLiteral
  | StringLiteral
  | InterpolatedString
  | BooleanLiteral
  | NilLiteral
  | ArrayLiteral
  | MapLiteral
  | FunctionLiteral
  | PrefixExpression
  | InfixExpression
  | CallExpression
  | IndexExpression
  | DotExpression
  | AssignmentExpression
  | RangeExpression
  | CaseExpression
  | UIElement;

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\0": "\\0",
};

function escape(value: string): string {
  return value.replace(/[\\"\n\t\r\0]/g, (ch) => ESCAPES[ch]);
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => (line.length > 0 ? "  " + line : line))
    .join("\n");
}

// Statements of a block, one per line. The `;` keeps a statement that starts
// with `(` or `-` from being read as a continuation of the previous one.
function section(items: { toString(): string }[]): string {
  if (items.length === 0) return "\n";
  return `\n${indent(items.map((i) => i.toString()).join(";\n"))}\n`;
}

function list(items: { toString(): string }[]): string {
  return items.map((i) => i.toString()).join(", ");
}

export class Program {
  readonly kind = "Program";
  statements: Statement[] = [];

  tokenLiteral(): string {
    if (this.statements.length > 0) {
      return this.statements[0].tokenLiteral();
    } else {
      return "";
    }
  }

  toString(): string {
    return this.statements.map((s) => s.toString()).join(";\n");
  }
}

// Supporting values

export class TypeAnnotation implements Node {
  readonly kind = "TypeAnnotation";
  token: Token;
  name: string;
  /** Non-empty only for generic types such as `Array[String]`. */
  parameters: TypeAnnotation[];

  constructor(token: Token, name: string, parameters: TypeAnnotation[] = []) {
    this.token = token;
    this.name = name;
    this.parameters = parameters;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    if (this.parameters.length === 0) return this.name;
    return `${this.name}[${list(this.parameters)}]`;
  }
}

export class Parameter implements Node {
  readonly kind = "Parameter";
  token: Token;
  name: Identifier;
  type: TypeAnnotation | null;

  constructor(token: Token, name: Identifier, type: TypeAnnotation | null) {
    this.token = token;
    this.name = name;
    this.type = type;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.type ? `${this.name}: ${this.type}` : this.name.toString();
  }
}

export class StructField implements Node {
  readonly kind = "StructField";
  token: Token;
  name: Identifier;
  type: TypeAnnotation;

  constructor(token: Token, name: Identifier, type: TypeAnnotation) {
    this.token = token;
    this.name = name;
    this.type = type;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.name}: ${this.type}`;
  }
}

export class ElseIfClause implements Node {
  readonly kind = "ElseIfClause";
  token: Token; // 'else'
  condition: Expression;
  block: BlockStatement;

  constructor(token: Token, condition: Expression, block: BlockStatement) {
    this.token = token;
    this.condition = condition;
    this.block = block;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `else if ${this.condition} ::${section(this.block.statements)}`;
  }
}

export class CaseBranch implements Node {
  readonly kind = "CaseBranch";
  token: Token;
  /** A literal, an identifier, or the `_` wildcard. */
  pattern: Expression;
  result: Expression;

  constructor(token: Token, pattern: Expression, result: Expression) {
    this.token = token;
    this.pattern = pattern;
    this.result = result;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.pattern} => ${this.result}`;
  }
}

export class Assertion implements Node {
  readonly kind = "Assertion";
  token: Token;
  left: Expression;
  operator: string;
  /** Null for unary assertions such as `isTrue` or a bare `raises`. */
  right: Expression | null;

  constructor(token: Token, left: Expression, operator: string, right: Expression | null) {
    this.token = token;
    this.left = left;
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    if (this.right) {
      return `${this.left} ${this.operator} ${this.right}`;
    }
    return `${this.left} ${this.operator}`;
  }
}

export class WhereBlock implements Node {
  readonly kind = "WhereBlock";
  token: Token;
  statements: Statement[];
  assertions: Assertion[];

  constructor(token: Token, statements: Statement[], assertions: Assertion[]) {
    this.token = token;
    this.statements = statements;
    this.assertions = assertions;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `where ::${section([...this.statements, ...this.assertions])}`;
  }
}

export class MapPair implements Node {
  readonly kind = "MapPair";
  token: Token;
  key: Expression;
  value: Expression;

  constructor(token: Token, key: Expression, value: Expression) {
    this.token = token;
    this.key = key;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.key}: ${this.value}`;
  }
}

export class ComponentBody implements Node {
  readonly kind = "ComponentBody";
  token: Token;
  statements: Statement[];
  root: UIElement | null;

  constructor(token: Token, statements: Statement[], root: UIElement | null) {
    this.token = token;
    this.statements = statements;
    this.root = root;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const items: { toString(): string }[] = [...this.statements];
    if (this.root) items.push(this.root);
    return items.map((i) => i.toString()).join(";\n");
  }
}

// Statements

export class VarStatement implements Node {
  readonly kind = "VarStatement";
  token: Token;
  /** Never empty; several names destructure a multi-value result. */
  names: Identifier[];
  type: TypeAnnotation | null;
  value: Expression;
  constant: boolean;

  constructor(token: Token, names: Identifier[], type: TypeAnnotation | null, value: Expression, constant: boolean) {
    this.token = token;
    this.names = names;
    this.type = type;
    this.value = value;
    this.constant = constant;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const keyword = this.constant ? "const" : "var";
    const type = this.type ? `: ${this.type}` : "";
    return `${keyword} ${list(this.names)}${type} = ${this.value}`;
  }
}

export class FnStatement implements Node {
  readonly kind = "FnStatement";
  token: Token;
  name: Identifier;
  /** Set for method declarations such as `fn Person.greet()`. */
  receiver: TypeAnnotation | null;
  parameters: Parameter[];
  returnType: TypeAnnotation | null;
  body: BlockStatement;
  where: WhereBlock | null;

  constructor(
    token: Token,
    name: Identifier,
    receiver: TypeAnnotation | null,
    parameters: Parameter[],
    returnType: TypeAnnotation | null,
    body: BlockStatement,
    where: WhereBlock | null,
  ) {
    this.token = token;
    this.name = name;
    this.receiver = receiver;
    this.parameters = parameters;
    this.returnType = returnType;
    this.body = body;
    this.where = where;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const receiver = this.receiver ? `${this.receiver}.` : "";
    const returnType = this.returnType ? `: ${this.returnType}` : "";
    const where = this.where ? this.where.toString() : "";
    return `fn ${receiver}${this.name}(${list(this.parameters)})${returnType} ::${section(this.body.statements)}${where}end`;
  }
}

export class StructStatement implements Node {
  readonly kind = "StructStatement";
  token: Token;
  name: Identifier;
  fields: StructField[];

  constructor(token: Token, name: Identifier, fields: StructField[]) {
    this.token = token;
    this.name = name;
    this.fields = fields;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    if (this.fields.length === 0) return `struct ${this.name} ::\nend`;
    return `struct ${this.name} ::\n${indent(this.fields.map((f) => f.toString()).join(",\n"))}\nend`;
  }
}

export class TypeStatement implements Node {
  readonly kind = "TypeStatement";
  token: Token;
  name: Identifier;
  type: TypeAnnotation;

  constructor(token: Token, name: Identifier, type: TypeAnnotation) {
    this.token = token;
    this.name = name;
    this.type = type;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `type ${this.name} = ${this.type}`;
  }
}

export class ModuleStatement implements Node {
  readonly kind = "ModuleStatement";
  token: Token;
  name: Identifier;
  body: BlockStatement;

  constructor(token: Token, name: Identifier, body: BlockStatement) {
    this.token = token;
    this.name = name;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `module ${this.name} ::${section(this.body.statements)}end`;
  }
}

export class UsingStatement implements Node {
  readonly kind = "UsingStatement";
  token: Token;
  path: StringLiteral;
  alias: Identifier | null;

  constructor(token: Token, path: StringLiteral, alias: Identifier | null) {
    this.token = token;
    this.path = path;
    this.alias = alias;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.alias ? `using ${this.path} as ${this.alias}` : `using ${this.path}`;
  }
}

export class ComponentStatement implements Node {
  readonly kind = "ComponentStatement";
  token: Token;
  name: Identifier;
  parameters: Parameter[];
  body: ComponentBody;

  constructor(token: Token, name: Identifier, parameters: Parameter[], body: ComponentBody) {
    this.token = token;
    this.name = name;
    this.parameters = parameters;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const body = this.body.toString();
    return `component ${this.name}(${list(this.parameters)}) ::${body ? `\n${indent(body)}\n` : "\n"}end`;
  }
}

export class IfStatement implements Node {
  readonly kind = "IfStatement";
  token: Token;
  condition: Expression;
  consequence: BlockStatement;
  alternatives: ElseIfClause[];
  alternative: BlockStatement | null;

  constructor(
    token: Token,
    condition: Expression,
    consequence: BlockStatement,
    alternatives: ElseIfClause[],
    alternative: BlockStatement | null,
  ) {
    this.token = token;
    this.condition = condition;
    this.consequence = consequence;
    this.alternatives = alternatives;
    this.alternative = alternative;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    let out = `if ${this.condition} ::${section(this.consequence.statements)}`;
    for (const clause of this.alternatives) {
      out += clause.toString();
    }
    if (this.alternative) {
      out += `else ::${section(this.alternative.statements)}`;
    }
    return out + "end";
  }
}

export class CaseStatement implements Node {
  readonly kind = "CaseStatement";
  token: Token;
  subject: Expression;
  branches: CaseBranch[];

  constructor(token: Token, subject: Expression, branches: CaseBranch[]) {
    this.token = token;
    this.subject = subject;
    this.branches = branches;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `case ${this.subject} ::${section(this.branches)}end`;
  }
}

export class ForStatement implements Node {
  readonly kind = "ForStatement";
  token: Token;
  /** Set for the `for index, value in ...` form. */
  index: Identifier | null;
  variable: Identifier;
  iterable: Expression;
  body: BlockStatement;

  constructor(token: Token, index: Identifier | null, variable: Identifier, iterable: Expression, body: BlockStatement) {
    this.token = token;
    this.index = index;
    this.variable = variable;
    this.iterable = iterable;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const vars = this.index ? `${this.index}, ${this.variable}` : this.variable.toString();
    return `for ${vars} in ${this.iterable} ::${section(this.body.statements)}end`;
  }
}

export class CheckStatement implements Node {
  readonly kind = "CheckStatement";
  token: Token;
  label: string | null;
  /** Setup statements; run before the assertions. */
  statements: Statement[];
  assertions: Assertion[];

  constructor(token: Token, label: string | null, statements: Statement[], assertions: Assertion[]) {
    this.token = token;
    this.label = label;
    this.statements = statements;
    this.assertions = assertions;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const label = this.label !== null ? ` "${escape(this.label)}"` : "";
    return `check${label} ::${section([...this.statements, ...this.assertions])}end`;
  }
}

export class ReturnStatement implements Node {
  readonly kind = "ReturnStatement";
  token: Token;
  values: Expression[];

  constructor(token: Token, values: Expression[]) {
    this.token = token;
    this.values = values;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.values.length > 0 ? `return ${list(this.values)}` : "return";
  }
}

export class BreakStatement implements Node {
  readonly kind = "BreakStatement";
  token: Token;

  constructor(token: Token) {
    this.token = token;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return "break";
  }
}

export class ExpressionStatement implements Node {
  readonly kind = "ExpressionStatement";
  token: Token;
  expression: Expression;

  constructor(token: Token, expression: Expression) {
    this.token = token;
    this.expression = expression;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.expression.toString();
  }
}

export class BlockStatement implements Node {
  readonly kind = "BlockStatement";
  token: Token; // '::'
  statements: Statement[] = [];

  constructor(token: Token) {
    this.token = token;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.statements.map((s) => s.toString()).join(";\n");
  }
}

// Expressions

export class Identifier implements Node {
  readonly kind = "Identifier";
  token: Token;
  value: string;

  constructor(token: Token, value: string) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.value;
  }
}

export class NumberLiteral implements Node {
  readonly kind = "NumberLiteral";
  token: Token;
  value: number;

  constructor(token: Token, value: number) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.token.literal;
  }
}

export class StringLiteral implements Node {
  readonly kind = "StringLiteral";
  token: Token;
  value: string;

  constructor(token: Token, value: string) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `"${escape(this.value)}"`;
  }
}

export class InterpolatedString implements Node {
  readonly kind = "InterpolatedString";
  token: Token;
  /** Literal text fragments are StringLiterals; everything else was embedded with `#{...}`. */
  parts: Expression[];

  constructor(token: Token, parts: Expression[]) {
    this.token = token;
    this.parts = parts;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const text = this.parts
      .map((part) => (part instanceof StringLiteral ? part.value : `#{${part}}`))
      .join("");
    return `"${escape(text)}"`;
  }
}

export class BooleanLiteral implements Node {
  readonly kind = "BooleanLiteral";
  token: Token;
  value: boolean;

  constructor(token: Token, value: boolean) {
    this.token = token;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.value ? "true" : "false";
  }
}

export class NilLiteral implements Node {
  readonly kind = "NilLiteral";
  token: Token;

  constructor(token: Token) {
    this.token = token;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return "nil";
  }
}

export class ArrayLiteral implements Node {
  readonly kind = "ArrayLiteral";
  token: Token;
  elements: Expression[];

  constructor(token: Token, elements: Expression[]) {
    this.token = token;
    this.elements = elements;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `[${list(this.elements)}]`;
  }
}

export class MapLiteral implements Node {
  readonly kind = "MapLiteral";
  token: Token;
  pairs: MapPair[];

  constructor(token: Token, pairs: MapPair[]) {
    this.token = token;
    this.pairs = pairs;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `{${list(this.pairs)}}`;
  }
}

export class FunctionLiteral implements Node {
  readonly kind = "FunctionLiteral";
  token: Token;
  parameters: Parameter[];
  body: BlockStatement;

  constructor(token: Token, parameters: Parameter[], body: BlockStatement) {
    this.token = token;
    this.parameters = parameters;
    this.body = body;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `fn(${list(this.parameters)}) ::${section(this.body.statements)}end`;
  }
}

export class PrefixExpression implements Node {
  readonly kind = "PrefixExpression";
  token: Token;
  operator: string;
  right: Expression;

  constructor(token: Token, operator: string, right: Expression) {
    this.token = token;
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const space = /^[a-z]/.test(this.operator) ? " " : "";
    return `(${this.operator}${space}${this.right})`;
  }
}

export class InfixExpression implements Node {
  readonly kind = "InfixExpression";
  token: Token;
  left: Expression;
  operator: string;
  right: Expression;

  constructor(token: Token, left: Expression, operator: string, right: Expression) {
    this.token = token;
    this.left = left;
    this.operator = operator;
    this.right = right;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `(${this.left} ${this.operator} ${this.right})`;
  }
}

export class CallExpression implements Node {
  readonly kind = "CallExpression";
  token: Token; // '('
  function: Expression;
  arguments: Expression[];

  constructor(token: Token, fn: Expression, args: Expression[]) {
    this.token = token;
    this.function = fn;
    this.arguments = args;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.function}(${list(this.arguments)})`;
  }
}

export class IndexExpression implements Node {
  readonly kind = "IndexExpression";
  token: Token; // '['
  left: Expression;
  index: Expression;

  constructor(token: Token, left: Expression, index: Expression) {
    this.token = token;
    this.left = left;
    this.index = index;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `(${this.left}[${this.index}])`;
  }
}

export class DotExpression implements Node {
  readonly kind = "DotExpression";
  token: Token; // '.'
  left: Expression;
  property: Identifier;

  constructor(token: Token, left: Expression, property: Identifier) {
    this.token = token;
    this.left = left;
    this.property = property;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.left}.${this.property}`;
  }
}

export class AssignmentExpression implements Node {
  readonly kind = "AssignmentExpression";
  token: Token; // '='
  target: Identifier | DotExpression | IndexExpression;
  value: Expression;

  constructor(token: Token, target: Identifier | DotExpression | IndexExpression, value: Expression) {
    this.token = token;
    this.target = target;
    this.value = value;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `${this.target} = ${this.value}`;
  }
}

export class RangeExpression implements Node {
  readonly kind = "RangeExpression";
  token: Token;
  start: Expression;
  end: Expression;
  /** `...` includes the end value, `..` stops before it. */
  inclusive: boolean;

  constructor(token: Token, start: Expression, end: Expression, inclusive: boolean) {
    this.token = token;
    this.start = start;
    this.end = end;
    this.inclusive = inclusive;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `(${this.start}${this.inclusive ? "..." : ".."}${this.end})`;
  }
}

export class CaseExpression implements Node {
  readonly kind = "CaseExpression";
  token: Token;
  subject: Expression;
  branches: CaseBranch[];

  constructor(token: Token, subject: Expression, branches: CaseBranch[]) {
    this.token = token;
    this.subject = subject;
    this.branches = branches;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `case ${this.subject} ::${section(this.branches)}end`;
  }
}

export class UIElement implements Node {
  readonly kind = "UIElement";
  token: Token;
  type: Identifier;
  /** In source order. */
  properties: Map<string, Expression>;
  children: UIElement[];

  constructor(token: Token, type: Identifier, properties: Map<string, Expression>, children: UIElement[]) {
    this.token = token;
    this.type = type;
    this.properties = properties;
    this.children = children;
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const items: string[] = [];
    this.properties.forEach((value, key) => items.push(`${key}: ${value}`));
    this.children.forEach((child) => items.push(child.toString()));
    if (items.length === 0) return `${this.type} {}`;
    return `${this.type} {\n${indent(items.join(",\n"))}\n}`;
  }
}
