/* =============================================================================
 * FIELD IDENTIFIER ERRORS
 * ============================================================================= */

/** Error codes */
export const FieldIdentifierErrorCode = {
  INVALID_ARGUMENT: "InvalidArgument",
  UNSUPPORTED_EXPRESSION_SHAPE: "UnsupportedExpressionShape",
  UNSUPPORTED_MEMBER_KIND: "UnsupportedMemberKind",
  UNSUPPORTED_OWNER_EXPRESSION_SHAPE: "UnsupportedOwnerExpressionShape",
} as const;

export type FieldIdentifierErrorCodeType =
  (typeof FieldIdentifierErrorCode)[keyof typeof FieldIdentifierErrorCode];

/**
 * Error creating a field identifier. Always a caller mistake; never retried.
 */
export class FieldIdentifierError extends Error {
  constructor(
    message: string,
    public readonly code: FieldIdentifierErrorCodeType,
    /** Name of the offending argument, for InvalidArgument. */
    public readonly argument?: "owner" | "fieldName",
    /** Printed accessor, when the failure came from one. */
    public readonly expression?: string,
  ) {
    super(message);
    this.name = "FieldIdentifierError";
  }
}
