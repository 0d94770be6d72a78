/**
 * @fieldkit/forms
 *
 * Stable, comparable identifiers for "this field on this object", built from
 * an owner and a field name or from an accessor expression.
 *
 * @example
 * ```typescript
 * import { FieldIdentifier } from "@fieldkit/forms";
 * import { parseLambda } from "@fieldkit/expression";
 *
 * const a = FieldIdentifier.create(model.address, "city");
 * const b = FieldIdentifier.create(parseLambda("() => model.address.city", { model }));
 * a.equals(b); // true
 * ```
 */

export { FieldIdentifier } from "./field-identifier.js";
export {
  FieldIdentifierError,
  FieldIdentifierErrorCode,
  type FieldIdentifierErrorCodeType,
} from "./errors.js";
