/**
 * @fieldkit/expression
 *
 * Introspectable accessor expressions: a closed AST, builders, a parser for
 * accessor source text, and a synchronous evaluator.
 *
 * @example
 * ```typescript
 * import { parseLambda, compileLambda } from "@fieldkit/expression";
 *
 * const accessor = parseLambda("() => model.address.city", { model });
 * accessor.body.$kind;            // "AccessMember"
 * compileLambda(accessor)();      // model.address.city
 * ```
 */

// === Model ===
export * from "./model/index.js";

// === Builders ===
export { Expr, type OwnerInput } from "./builders.js";

// === Parsing ===
export { parseLambda, lambda, type Closure } from "./parsing/lambda-parser.js";

// === Evaluation ===
export { evaluate, compileLambda } from "./evaluate/evaluate.js";

// === Printing ===
export { printExpression } from "./print.js";

// === Errors ===
export {
  ExpressionParseError,
  ExpressionParseErrorCode,
  EvaluationError,
  EvaluationErrorCode,
  type ExpressionParseErrorCodeType,
  type EvaluationErrorCodeType,
} from "./shared/errors.js";

// === Debug ===
export {
  debug,
  getDebugChannel,
  configureDebug,
  resetDebugConfig,
  refreshDebugChannels,
  isDebugEnabled,
  formatMessage,
  DEBUG_ENV_VAR,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./shared/debug.js";
