import type { Expression, LambdaExpression } from "./model/ast.js";

/**
 * Render an expression back to compact source-like text.
 * Constants print their literal form, or `<const Ctor>` for objects.
 */
export function printExpression(expr: Expression | LambdaExpression): string {
  switch (expr.$kind) {
    case "Lambda":
      return `() => ${printExpression(expr.body)}`;
    case "Constant":
      return printConstant(expr.value);
    case "AccessMember":
      return `${printExpression(expr.object)}${expr.optional ? "?." : "."}${expr.member.name}`;
    case "AccessKeyed":
      return `${printExpression(expr.object)}${expr.optional ? "?." : ""}[${printExpression(expr.key)}]`;
    case "CallMember":
      return `${printExpression(expr.object)}${expr.optional ? "?." : "."}${expr.name}(${printArgs(expr.args)})`;
    case "CallFunction":
      return `${printExpression(expr.func)}(${printArgs(expr.args)})`;
    case "Convert":
      return `(${printExpression(expr.operand)} as ${expr.type})`;
    case "Unary": {
      const op = expr.operation === "typeof" || expr.operation === "void"
        ? `${expr.operation} `
        : expr.operation;
      return `${op}${printExpression(expr.expression)}`;
    }
    case "Binary":
      return `(${printExpression(expr.left)} ${expr.operation} ${printExpression(expr.right)})`;
    case "Conditional":
      return `(${printExpression(expr.condition)} ? ${printExpression(expr.yes)} : ${printExpression(expr.no)})`;
  }
}

function printArgs(args: readonly Expression[]): string {
  return args.map(printExpression).join(", ");
}

function printConstant(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
    case "boolean":
      return String(value);
    case "bigint":
      return `${value}n`;
    case "undefined":
      return "undefined";
    case "symbol":
      return value.toString();
    case "function":
      return `<const fn ${value.name || "anonymous"}>`;
    case "object": {
      if (value === null) return "null";
      const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
      const name = typeof ctor === "function" && ctor.name ? ctor.name : "Object";
      return `<const ${name}>`;
    }
  }
  return String(value);
}
