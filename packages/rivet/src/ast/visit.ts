import * as AST from "./ast";

export type AnyNode =
  | AST.Program
  | AST.Statement
  | AST.Expression
  | AST.TypeAnnotation
  | AST.Parameter
  | AST.StructField
  | AST.ElseIfClause
  | AST.CaseBranch
  | AST.Assertion
  | AST.WhereBlock
  | AST.MapPair
  | AST.ComponentBody;

function present<T>(value: T | null): T[] {
  return value === null ? [] : [value];
}

/** Direct children of a node, in source order. */
export function children(node: AnyNode): AnyNode[] {
  switch (node.kind) {
    case "Program":
      return node.statements;
    case "VarStatement":
      return [...node.names, ...present(node.type), node.value];
    case "FnStatement":
      return [
        ...present(node.receiver),
        node.name,
        ...node.parameters,
        ...present(node.returnType),
        node.body,
        ...present(node.where),
      ];
    case "StructStatement":
      return [node.name, ...node.fields];
    case "TypeStatement":
      return [node.name, node.type];
    case "ModuleStatement":
      return [node.name, node.body];
    case "UsingStatement":
      return [node.path, ...present(node.alias)];
    case "ComponentStatement":
      return [node.name, ...node.parameters, node.body];
    case "IfStatement":
      return [node.condition, node.consequence, ...node.alternatives, ...present(node.alternative)];
    case "CaseStatement":
    case "CaseExpression":
      return [node.subject, ...node.branches];
    case "ForStatement":
      return [...present(node.index), node.variable, node.iterable, node.body];
    case "CheckStatement":
    case "WhereBlock":
      return [...node.statements, ...node.assertions];
    case "ReturnStatement":
      return node.values;
    case "BreakStatement":
      return [];
    case "ExpressionStatement":
      return [node.expression];
    case "BlockStatement":
      return node.statements;
    case "Identifier":
    case "NumberLiteral":
    case "StringLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      return [];
    case "InterpolatedString":
      return node.parts;
    case "ArrayLiteral":
      return node.elements;
    case "MapLiteral":
      return node.pairs;
    case "FunctionLiteral":
      return [...node.parameters, node.body];
    case "PrefixExpression":
      return [node.right];
    case "InfixExpression":
      return [node.left, node.right];
    case "CallExpression":
      return [node.function, ...node.arguments];
    case "IndexExpression":
      return [node.left, node.index];
    case "DotExpression":
      return [node.left, node.property];
    case "AssignmentExpression":
      return [node.target, node.value];
    case "RangeExpression":
      return [node.start, node.end];
    case "UIElement":
      return [node.type, ...node.properties.values(), ...node.children];
    case "TypeAnnotation":
      return node.parameters;
    case "Parameter":
      return [node.name, ...present(node.type)];
    case "StructField":
      return [node.name, node.type];
    case "ElseIfClause":
      return [node.condition, node.block];
    case "CaseBranch":
      return [node.pattern, node.result];
    case "Assertion":
      return [node.left, ...present(node.right)];
    case "MapPair":
      return [node.key, node.value];
    case "ComponentBody":
      return [...node.statements, ...present(node.root)];
  }
}

/**
 * Visits `node` and its descendants depth-first. Returning false from
 * `visitor` skips that node's children.
 */
export function walk(node: AnyNode, visitor: (node: AnyNode, parents: AnyNode[]) => boolean | void): void {
  const parents: AnyNode[] = [];
  const visit = (current: AnyNode) => {
    if (visitor(current, parents) === false) return;
    parents.push(current);
    for (const child of children(current)) {
      visit(child);
    }
    parents.pop();
  };
  visit(node);
}

/**
 * The node-kind tree, one kind per line, indented two spaces per level.
 * Two parses have the same shape when their structures are equal.
 */
export function structure(node: AnyNode): string {
  const lines: string[] = [];
  walk(node, (current, parents) => {
    lines.push(`${"  ".repeat(parents.length)}${current.kind}`);
  });
  return lines.join("\n");
}
