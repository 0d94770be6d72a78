import {
  type AccessKeyedExpression,
  type AccessMemberExpression,
  type BinaryExpression,
  type BinaryOperator,
  type CallFunctionExpression,
  type CallMemberExpression,
  type ConditionalExpression,
  type ConstantExpression,
  type ConvertExpression,
  type Expression,
  type LambdaExpression,
  type MemberInfo,
  type UnaryExpression,
  type UnaryOperator,
} from "./model/ast.js";
import { isRegisteredExpression, registerExpression } from "./model/registry.js";

/*
 * Hand-built expression trees, for callers that describe an accessor
 * without going through the parser. Nodes are frozen plain objects.
 */

/**
 * A chain root: a node from these builders or the parser, or any other value,
 * which is wrapped in a Constant even when it looks like a node.
 */
export type OwnerInput = Expression | object;

function frozen<T extends Expression | LambdaExpression>(node: T): T {
  Object.freeze(node);
  return registerExpression(node);
}

function toOwner(owner: OwnerInput): Expression {
  return isRegisteredExpression(owner) ? owner : constant(owner);
}

function constant(value: unknown): ConstantExpression {
  return frozen<ConstantExpression>({ $kind: "Constant", value });
}

function member(owner: OwnerInput, info: MemberInfo, optional = false): AccessMemberExpression {
  return frozen<AccessMemberExpression>({
    $kind: "AccessMember",
    object: toOwner(owner),
    member: { kind: info.kind, name: info.name },
    optional,
  });
}

export const Expr = {
  constant,

  member,

  /** Read a property (accessor or data property) off `owner`. */
  property(owner: OwnerInput, name: string): AccessMemberExpression {
    return member(owner, { kind: "property", name });
  },

  /** Read a field off `owner`. */
  field(owner: OwnerInput, name: string): AccessMemberExpression {
    return member(owner, { kind: "field", name });
  },

  /** Read a method off `owner` without calling it. */
  method(owner: OwnerInput, name: string): AccessMemberExpression {
    return member(owner, { kind: "method", name });
  },

  keyed(owner: OwnerInput, key: Expression, optional = false): AccessKeyedExpression {
    return frozen<AccessKeyedExpression>({ $kind: "AccessKeyed", object: toOwner(owner), key, optional });
  },

  callMember(owner: OwnerInput, name: string, args: Expression[] = [], optional = false): CallMemberExpression {
    return frozen<CallMemberExpression>({ $kind: "CallMember", object: toOwner(owner), name, args: [...args], optional });
  },

  callFunction(func: Expression, args: Expression[] = []): CallFunctionExpression {
    return frozen<CallFunctionExpression>({ $kind: "CallFunction", func, args: [...args] });
  },

  convert(operand: Expression, type: string): ConvertExpression {
    return frozen<ConvertExpression>({ $kind: "Convert", type, operand });
  },

  unary(operation: UnaryOperator, expression: Expression): UnaryExpression {
    return frozen<UnaryExpression>({ $kind: "Unary", operation, expression });
  },

  binary(operation: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
    return frozen<BinaryExpression>({ $kind: "Binary", operation, left, right });
  },

  conditional(condition: Expression, yes: Expression, no: Expression): ConditionalExpression {
    return frozen<ConditionalExpression>({ $kind: "Conditional", condition, yes, no });
  },

  lambda<T = unknown>(body: Expression): LambdaExpression<T> {
    return frozen<LambdaExpression<T>>({ $kind: "Lambda", body });
  },
} as const;
