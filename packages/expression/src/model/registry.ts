import { isExpression, type Expression, type LambdaExpression } from "./ast.js";

/*
 * Nodes created by the builders and the parser. User objects may carry a
 * `$kind` of their own, so only membership here marks a value as a node when
 * a builder decides whether to wrap a chain root.
 */
const nodes = new WeakSet<object>();

export function registerExpression<T extends Expression | LambdaExpression>(node: T): T {
  nodes.add(node);
  return node;
}

export function isRegisteredExpression(value: unknown): value is Expression {
  return typeof value === "object" && value !== null && nodes.has(value) && isExpression(value);
}
