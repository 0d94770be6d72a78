import {
  Expr,
  TOP_TYPE,
  compileLambda,
  debug,
  isAccessMember,
  isDebugEnabled,
  isConvert,
  isLambda,
  lambda,
  printExpression,
  type AccessMemberExpression,
  type Closure,
  type Expression,
  type LambdaExpression,
} from "@fieldkit/expression";
import { FieldIdentifierError, FieldIdentifierErrorCode } from "./errors.js";
import { combineHashes, hashString, identityOf } from "./identity.js";

/**
 * Uniquely identifies a single editable field: a named member on one specific
 * owner object.
 *
 * Two identifiers are equal when they point at the very same owner object
 * (reference identity, never structural equality) and carry the same field
 * name, compared ordinally. The identifier does not keep its owner alive
 * beyond its own lifetime and never copies it.
 *
 * Owners must be objects. Primitives have no identity, so two "equal" numbers
 * or strings would collide; they are rejected at construction.
 */
export class FieldIdentifier {
  /** The object that owns the editable field. */
  readonly owner: object;

  /** The name of the editable field. */
  readonly fieldName: string;

  /**
   * Identifier for the named field on `owner`.
   *
   * @throws FieldIdentifierError `InvalidArgument` when `owner` is missing or
   * not an object, or `fieldName` is missing or empty.
   */
  static create<TModel extends object>(owner: TModel, fieldName: string): FieldIdentifier;
  /**
   * Identifier for the member an accessor reads, e.g. the lambda parsed from
   * `() => model.address.city` yields `(model.address, "city")`.
   *
   * The owner part of the accessor is evaluated once; the final member is
   * never read.
   *
   * @throws FieldIdentifierError `UnsupportedExpressionShape` when the body is
   * not a member read, `UnsupportedMemberKind` when the member is a method,
   * `UnsupportedOwnerExpressionShape` when the owner is neither a constant nor
   * a member chain, and `InvalidArgument` when the owner evaluates to a
   * non-object.
   */
  static create<TField>(accessor: LambdaExpression<TField>): FieldIdentifier;
  static create(
    ...args: [owner: object, fieldName: string] | [accessor: LambdaExpression]
  ): FieldIdentifier {
    if (args.length === 1) {
      return fromAccessorExpression(args[0]);
    }
    return new FieldIdentifier(args[0], args[1]);
  }

  /**
   * Parse `fn`'s source and resolve it like {@link FieldIdentifier.create}.
   * Every variable the accessor reads must be passed in `closure`.
   *
   * ```typescript
   * FieldIdentifier.fromAccessor(() => model.address.city, { model });
   * ```
   */
  static fromAccessor<TField>(fn: () => TField, closure: Closure): FieldIdentifier {
    return FieldIdentifier.create(lambda(fn, closure));
  }

  static is(value: unknown): value is FieldIdentifier {
    return value instanceof FieldIdentifier;
  }

  private constructor(owner: unknown, fieldName: unknown) {
    if (typeof fieldName !== "string" || fieldName.length === 0) {
      throw new FieldIdentifierError(
        "The field name cannot be null or empty.",
        FieldIdentifierErrorCode.INVALID_ARGUMENT,
        "fieldName",
      );
    }
    if (owner === null || owner === undefined) {
      throw new FieldIdentifierError(
        "The owner cannot be null or undefined.",
        FieldIdentifierErrorCode.INVALID_ARGUMENT,
        "owner",
      );
    }
    if (!isReference(owner)) {
      throw new FieldIdentifierError(
        `The owner must be an object, got ${typeof owner}.`,
        FieldIdentifierErrorCode.INVALID_ARGUMENT,
        "owner",
      );
    }

    this.owner = owner;
    this.fieldName = fieldName;
    Object.freeze(this);
    if (isDebugEnabled("forms")) {
      debug.forms("identifier.create", { owner: identityOf(owner), fieldName });
    }
  }

  equals(other: unknown): boolean {
    return other instanceof FieldIdentifier
      && other.owner === this.owner
      && other.fieldName === this.fieldName;
  }

  hashCode(): number {
    return combineHashes(identityOf(this.owner), hashString(this.fieldName));
  }

  toString(): string {
    return `FieldIdentifier(${ownerTypeName(this.owner)}#${identityOf(this.owner)}.${this.fieldName})`;
  }
}

function fromAccessorExpression(accessor: LambdaExpression): FieldIdentifier {
  if (!isLambda(accessor)) {
    throw new FieldIdentifierError(
      "Expected an accessor lambda expression, or an owner and a field name.",
      FieldIdentifierErrorCode.INVALID_ARGUMENT,
    );
  }
  let body: Expression = accessor.body;

  // Accessors typed to return `unknown` carry one widening conversion.
  if (isConvert(body) && body.type === TOP_TYPE) {
    body = body.operand;
  }

  if (!isAccessMember(body)) {
    throw new FieldIdentifierError(
      `Only member access expressions are supported, got ${body.$kind}.`,
      FieldIdentifierErrorCode.UNSUPPORTED_EXPRESSION_SHAPE,
      undefined,
      printExpression(body),
    );
  }

  const fieldName = memberFieldName(body);
  const owner = resolveOwner(body);
  if (isDebugEnabled("forms")) {
    debug.forms("identifier.resolve", { accessor: printExpression(body), ownerKind: body.object.$kind });
  }
  return FieldIdentifier.create(toOwnerArgument(owner, body), fieldName);
}

function memberFieldName(expr: AccessMemberExpression): string {
  switch (expr.member.kind) {
    case "property":
    case "field":
      return expr.member.name;
    default:
      throw new FieldIdentifierError(
        `Only property and field members are supported, got ${expr.member.kind} '${expr.member.name}'.`,
        FieldIdentifierErrorCode.UNSUPPORTED_MEMBER_KIND,
        undefined,
        printExpression(expr),
      );
  }
}

function resolveOwner(expr: AccessMemberExpression): unknown {
  const ownerExpr = expr.object;
  switch (ownerExpr.$kind) {
    case "Constant":
      return ownerExpr.value;
    case "AccessMember": {
      // One throwaway evaluator per call; getters along the chain run once.
      const evaluateOwner = compileLambda(Expr.lambda(ownerExpr));
      return evaluateOwner();
    }
    default:
      throw new FieldIdentifierError(
        `Only constant and member access owner expressions are supported, got ${ownerExpr.$kind}.`,
        FieldIdentifierErrorCode.UNSUPPORTED_OWNER_EXPRESSION_SHAPE,
        undefined,
        printExpression(expr),
      );
  }
}

function toOwnerArgument(owner: unknown, expr: AccessMemberExpression): object {
  if (owner === null || owner === undefined) {
    throw new FieldIdentifierError(
      `The owner of '${expr.member.name}' evaluated to ${owner === null ? "null" : "undefined"}.`,
      FieldIdentifierErrorCode.INVALID_ARGUMENT,
      "owner",
      printExpression(expr),
    );
  }
  if (!isReference(owner)) {
    throw new FieldIdentifierError(
      `The owner of '${expr.member.name}' must be an object, got ${typeof owner}.`,
      FieldIdentifierErrorCode.INVALID_ARGUMENT,
      "owner",
      printExpression(expr),
    );
  }
  return owner;
}

function isReference(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function ownerTypeName(owner: object): string {
  const ctor: unknown = Reflect.getPrototypeOf(owner)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}
