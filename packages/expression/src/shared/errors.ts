import type { TextSpan } from "../model/ast.js";

/* =============================================================================
 * PARSE ERRORS
 * ============================================================================= */

/** Error codes */
export const ExpressionParseErrorCode = {
  INVALID_LAMBDA: "InvalidLambda",
  UNBOUND_IDENTIFIER: "UnboundIdentifier",
  UNSUPPORTED_SYNTAX: "UnsupportedSyntax",
} as const;

export type ExpressionParseErrorCodeType =
  (typeof ExpressionParseErrorCode)[keyof typeof ExpressionParseErrorCode];

/**
 * Error while turning accessor source text into an expression tree.
 */
export class ExpressionParseError extends Error {
  constructor(
    message: string,
    public readonly code: ExpressionParseErrorCodeType,
    public readonly source: string,
    public readonly span?: TextSpan,
  ) {
    super(message);
    this.name = "ExpressionParseError";
  }
}

/* =============================================================================
 * EVALUATION ERRORS
 * ============================================================================= */

export const EvaluationErrorCode = {
  NULL_REFERENCE: "NullReference",
  NOT_CALLABLE: "NotCallable",
} as const;

export type EvaluationErrorCodeType =
  (typeof EvaluationErrorCode)[keyof typeof EvaluationErrorCode];

/**
 * Error while evaluating an expression tree against live objects.
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: EvaluationErrorCodeType,
    /** Printed form of the node that failed. */
    public readonly expression: string,
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}
