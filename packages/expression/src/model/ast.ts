/* ===========================
 * Accessor Expression AST
 * =========================== */

/** Half-open offsets into the source text a node was parsed from. */
export interface TextSpan {
  start: number;
  end: number;
}

export type UnaryOperator = "!" | "-" | "+" | "typeof" | "void";
export type BinaryOperator =
  | "??" | "&&" | "||"
  | "==" | "===" | "!=" | "!=="
  | "instanceof" | "in"
  | "+" | "-" | "*" | "/" | "%" | "**"
  | "<" | ">" | "<=" | ">=";

/**
 * What a member read resolves to on its owner.
 * `property` and `field` are readable storage; `method` is a function member
 * read without being called.
 */
export type MemberKind = "property" | "field" | "method";

export interface MemberInfo {
  kind: MemberKind;
  name: string;
}

export type Expression =
  | ConstantExpression
  | AccessMemberExpression
  | AccessKeyedExpression
  | CallMemberExpression
  | CallFunctionExpression
  | ConvertExpression
  | UnaryExpression
  | BinaryExpression
  | ConditionalExpression;

export type ExpressionKind = Expression["$kind"];

/* ---- AST nodes ---- */

/** A value already in hand: a captured variable or a literal. */
export interface ConstantExpression {
  $kind: "Constant";
  span?: TextSpan;
  value: unknown;
}

export interface AccessMemberExpression {
  $kind: "AccessMember";
  span?: TextSpan;
  object: Expression;
  member: MemberInfo;
  optional: boolean;
}

export interface AccessKeyedExpression {
  $kind: "AccessKeyed";
  span?: TextSpan;
  object: Expression;
  key: Expression;
  optional: boolean;
}

export interface CallMemberExpression {
  $kind: "CallMember";
  span?: TextSpan;
  object: Expression;
  name: string;
  args: Expression[];
  optional: boolean;
}

export interface CallFunctionExpression {
  $kind: "CallFunction";
  span?: TextSpan;
  func: Expression;
  args: Expression[];
}

/**
 * Type-level conversion (`x as T`, `<T>x`). `type` is the type text as written;
 * `unknown` is the top type.
 */
export interface ConvertExpression {
  $kind: "Convert";
  span?: TextSpan;
  type: string;
  operand: Expression;
}

export interface UnaryExpression {
  $kind: "Unary";
  span?: TextSpan;
  operation: UnaryOperator;
  expression: Expression;
}

export interface BinaryExpression {
  $kind: "Binary";
  span?: TextSpan;
  operation: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface ConditionalExpression {
  $kind: "Conditional";
  span?: TextSpan;
  condition: Expression;
  yes: Expression;
  no: Expression;
}

/**
 * Zero-argument function description, not yet executed.
 * `T` records the type of the value the body produces.
 */
export interface LambdaExpression<T = unknown> {
  $kind: "Lambda";
  body: Expression;
  /** Text the lambda was parsed from, when it came from the parser. */
  source?: string;
  /** Phantom marker, never set at runtime. */
  readonly __result?: T;
}

/** Target type text of a conversion that widens to the top type. */
export const TOP_TYPE = "unknown";

/* ---- Guards ---- */

const EXPRESSION_KINDS: ReadonlySet<string> = new Set<ExpressionKind>([
  "Constant",
  "AccessMember",
  "AccessKeyed",
  "CallMember",
  "CallFunction",
  "Convert",
  "Unary",
  "Binary",
  "Conditional",
]);

export function isExpression(value: unknown): value is Expression {
  if (value === null || typeof value !== "object") return false;
  const kind: unknown = Reflect.get(value, "$kind");
  return typeof kind === "string" && EXPRESSION_KINDS.has(kind);
}

export function isConstant(expr: Expression): expr is ConstantExpression {
  return expr.$kind === "Constant";
}

export function isAccessMember(expr: Expression): expr is AccessMemberExpression {
  return expr.$kind === "AccessMember";
}

export function isConvert(expr: Expression): expr is ConvertExpression {
  return expr.$kind === "Convert";
}

export function isLambda(value: unknown): value is LambdaExpression {
  if (value === null || typeof value !== "object") return false;
  return Reflect.get(value, "$kind") === "Lambda" && isExpression(Reflect.get(value, "body"));
}
