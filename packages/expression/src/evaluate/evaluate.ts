import type {
  BinaryOperator,
  Expression,
  LambdaExpression,
  UnaryOperator,
} from "../model/ast.js";
import { EvaluationError, EvaluationErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { printExpression } from "../print.js";

/**
 * Evaluate an expression synchronously against the live objects it references.
 *
 * Optional chains (`a?.b.c`) short-circuit to `undefined` for the rest of the
 * chain once a nullish link is found, matching JavaScript.
 */
export function evaluate(expr: Expression): unknown {
  const result = evalNode(expr);
  return result === SHORT_CIRCUIT ? undefined : result;
}

/**
 * Build a zero-argument function that evaluates the lambda body on every call.
 * Nothing is cached: each call walks the tree again.
 */
export function compileLambda(lambda: LambdaExpression): () => unknown {
  const body = lambda.body;
  debug.expression("compile", { body: printExpression(body) });
  return () => evaluate(body);
}

/** Marker threaded through a chain after an optional link hit null/undefined. */
const SHORT_CIRCUIT: unique symbol = Symbol("short-circuit");

function evalNode(expr: Expression): unknown {
  switch (expr.$kind) {
    case "Constant":
      return expr.value;

    case "Convert":
      return evalNode(expr.operand);

    case "AccessMember": {
      const owner = evalNode(expr.object);
      if (owner === SHORT_CIRCUIT) return SHORT_CIRCUIT;
      if (owner == null) {
        if (expr.optional) return SHORT_CIRCUIT;
        throw nullReference(expr, owner, expr.member.name);
      }
      const value: unknown = Reflect.get(Object(owner), expr.member.name, owner);
      if (expr.member.kind === "method" && typeof value === "function") {
        return value.bind(owner);
      }
      return value;
    }

    case "AccessKeyed": {
      const owner = evalNode(expr.object);
      if (owner === SHORT_CIRCUIT) return SHORT_CIRCUIT;
      if (owner == null) {
        if (expr.optional) return SHORT_CIRCUIT;
        throw nullReference(expr, owner, printExpression(expr.key));
      }
      const key = evaluate(expr.key);
      return Reflect.get(Object(owner), toPropertyKey(key), owner);
    }

    case "CallMember": {
      const owner = evalNode(expr.object);
      if (owner === SHORT_CIRCUIT) return SHORT_CIRCUIT;
      if (owner == null) {
        if (expr.optional) return SHORT_CIRCUIT;
        throw nullReference(expr, owner, expr.name);
      }
      const fn: unknown = Reflect.get(Object(owner), expr.name, owner);
      if (typeof fn !== "function") {
        throw new EvaluationError(
          `'${expr.name}' is not a function`,
          EvaluationErrorCode.NOT_CALLABLE,
          printExpression(expr),
        );
      }
      return Reflect.apply(fn, owner, expr.args.map(evaluate));
    }

    case "CallFunction": {
      const fn = evaluate(expr.func);
      if (typeof fn !== "function") {
        throw new EvaluationError(
          `${printExpression(expr.func)} is not a function`,
          EvaluationErrorCode.NOT_CALLABLE,
          printExpression(expr),
        );
      }
      return Reflect.apply(fn, undefined, expr.args.map(evaluate));
    }

    case "Unary":
      return applyUnary(expr.operation, evaluate(expr.expression));

    case "Binary":
      return applyBinary(expr.operation, expr.left, expr.right);

    case "Conditional":
      return evaluate(expr.condition) ? evaluate(expr.yes) : evaluate(expr.no);
  }
}

function nullReference(expr: Expression, owner: null | undefined, name: string): EvaluationError {
  return new EvaluationError(
    `Cannot read '${name}' of ${owner === null ? "null" : "undefined"}`,
    EvaluationErrorCode.NULL_REFERENCE,
    printExpression(expr),
  );
}

function toPropertyKey(key: unknown): PropertyKey {
  return typeof key === "symbol" || typeof key === "number" ? key : String(key);
}

function applyUnary(op: UnaryOperator, value: unknown): unknown {
  switch (op) {
    case "!":
      return !value;
    case "-":
      return typeof value === "bigint" ? -value : -Number(value);
    case "+":
      return Number(value);
    case "typeof":
      return typeof value;
    case "void":
      return undefined;
  }
}

function applyBinary(op: BinaryOperator, leftExpr: Expression, rightExpr: Expression): unknown {
  // Logical operators evaluate the right side lazily.
  switch (op) {
    case "&&": {
      const left = evaluate(leftExpr);
      return left ? evaluate(rightExpr) : left;
    }
    case "||": {
      const left = evaluate(leftExpr);
      return left ? left : evaluate(rightExpr);
    }
    case "??": {
      const left = evaluate(leftExpr);
      return left ?? evaluate(rightExpr);
    }
    default:
      break;
  }

  const left = evaluate(leftExpr);
  const right = evaluate(rightExpr);
  switch (op) {
    case "==":
      return left == right;
    case "===":
      return left === right;
    case "!=":
      return left != right;
    case "!==":
      return left !== right;
    case "instanceof":
      return typeof right === "function" && left instanceof right;
    case "in":
      return right !== null && typeof right === "object" && toPropertyKey(left) in right;
    case "+":
      if (typeof left === "string" || typeof right === "string") {
        return String(left) + String(right);
      }
      return numeric(left, right, (a, b) => a + b, (a, b) => a + b);
    case "-":
      return numeric(left, right, (a, b) => a - b, (a, b) => a - b);
    case "*":
      return numeric(left, right, (a, b) => a * b, (a, b) => a * b);
    case "/":
      return numeric(left, right, (a, b) => a / b, (a, b) => a / b);
    case "%":
      return numeric(left, right, (a, b) => a % b, (a, b) => a % b);
    case "**":
      return numeric(left, right, (a, b) => a ** b, (a, b) => a ** b);
    case "<":
      return compare(left, right) < 0;
    case ">":
      return compare(left, right) > 0;
    case "<=":
      return compare(left, right) <= 0;
    case ">=":
      return compare(left, right) >= 0;
  }
}

function numeric(
  left: unknown,
  right: unknown,
  onNumber: (a: number, b: number) => number,
  onBigInt: (a: bigint, b: bigint) => bigint,
): number | bigint {
  if (typeof left === "bigint" && typeof right === "bigint") {
    return onBigInt(left, right);
  }
  return onNumber(Number(left), Number(right));
}

/** Relational comparison: strings compare lexically, everything else numerically. */
function compare(left: unknown, right: unknown): number {
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  const a = Number(left);
  const b = Number(right);
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.NaN;
  return a - b;
}
