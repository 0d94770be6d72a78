/**
 * Lambda Parser
 *
 * Turns accessor source text (`() => model.address.city`) into an expression
 * tree. Uses the TypeScript compiler API for parsing; free identifiers are
 * bound through a caller-supplied closure record into Constant nodes, the way
 * a compiler captures variables for a lambda.
 */

import ts from "typescript";
import type {
  BinaryOperator,
  Expression,
  LambdaExpression,
  TextSpan,
} from "../model/ast.js";
import {
  ExpressionParseError,
  ExpressionParseErrorCode,
  type ExpressionParseErrorCodeType,
} from "../shared/errors.js";
import { registerExpression } from "../model/registry.js";
import { debug } from "../shared/debug.js";

/** Captured variables visible to the accessor body, by name. */
export type Closure = Readonly<Record<string, unknown>>;

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Parse accessor source into a lambda.
 *
 * Accepts a zero-parameter arrow function, a zero-parameter function
 * expression whose body is a single `return`, or a bare expression.
 */
export function parseLambda<T = unknown>(source: string, closure: Closure = {}): LambdaExpression<T> {
  const parser = new LambdaParser(source, closure);
  const body = parser.parse();
  debug.expression("parse", { source, kind: body.$kind });
  return { $kind: "Lambda", body, source };
}

/**
 * Parse a zero-argument function from its own source text.
 *
 * Closed-over variables are not visible through `Function.prototype.toString`,
 * so every free identifier the body uses must be supplied in `closure`.
 */
export function lambda<T>(fn: () => T, closure: Closure = {}): LambdaExpression<T> {
  return parseLambda<T>(fn.toString(), closure);
}

/* =============================================================================
 * PARSER
 * ============================================================================= */

/** Wrapping keeps object-literal-looking bodies and function expressions parseable as expressions. */
const PREFIX = "(";
const SUFFIX = "\n);";

const LITERAL_IDENTIFIERS: ReadonlyMap<string, unknown> = new Map<string, unknown>([
  ["undefined", undefined],
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
]);

const BINARY_OPERATORS: ReadonlyMap<ts.SyntaxKind, BinaryOperator> = new Map<ts.SyntaxKind, BinaryOperator>([
  [ts.SyntaxKind.QuestionQuestionToken, "??"],
  [ts.SyntaxKind.AmpersandAmpersandToken, "&&"],
  [ts.SyntaxKind.BarBarToken, "||"],
  [ts.SyntaxKind.EqualsEqualsToken, "=="],
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "==="],
  [ts.SyntaxKind.ExclamationEqualsToken, "!="],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!=="],
  [ts.SyntaxKind.InstanceOfKeyword, "instanceof"],
  [ts.SyntaxKind.InKeyword, "in"],
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.AsteriskToken, "*"],
  [ts.SyntaxKind.SlashToken, "/"],
  [ts.SyntaxKind.PercentToken, "%"],
  [ts.SyntaxKind.AsteriskAsteriskToken, "**"],
  [ts.SyntaxKind.LessThanToken, "<"],
  [ts.SyntaxKind.GreaterThanToken, ">"],
  [ts.SyntaxKind.LessThanEqualsToken, "<="],
  [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
]);

class LambdaParser {
  private readonly sourceFile: ts.SourceFile;

  constructor(
    private readonly source: string,
    private readonly closure: Closure,
  ) {
    this.sourceFile = ts.createSourceFile(
      "accessor.ts",
      `${PREFIX}${source}${SUFFIX}`,
      ts.ScriptTarget.Latest,
      /* setParentNodes */ true,
      ts.ScriptKind.TS,
    );
  }

  parse(): Expression {
    const diagnostic = parseDiagnosticsOf(this.sourceFile)[0];
    if (diagnostic !== undefined) {
      const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
      const span = diagnostic.start === undefined
        ? undefined
        : { start: diagnostic.start - PREFIX.length, end: diagnostic.start + (diagnostic.length ?? 0) - PREFIX.length };
      throw new ExpressionParseError(`Malformed accessor: ${message}`, ExpressionParseErrorCode.INVALID_LAMBDA, this.source, span);
    }

    const statements = this.sourceFile.statements;
    const first = statements[0];
    if (statements.length !== 1 || first === undefined || !ts.isExpressionStatement(first)) {
      throw this.error("Accessor must be a single expression", ExpressionParseErrorCode.INVALID_LAMBDA);
    }
    if (first.getEnd() !== this.sourceFile.text.length) {
      throw this.error("Unexpected text after accessor", ExpressionParseErrorCode.INVALID_LAMBDA);
    }

    const root = skipParentheses(first.expression);
    if (ts.isArrowFunction(root) || ts.isFunctionExpression(root)) {
      return this.convert(this.lambdaBody(root));
    }
    return this.convert(root);
  }

  private lambdaBody(fn: ts.ArrowFunction | ts.FunctionExpression): ts.Expression {
    if (fn.parameters.length > 0) {
      throw this.error("Accessor must take no parameters", ExpressionParseErrorCode.INVALID_LAMBDA, fn.parameters[0]);
    }
    const isAsync = ts.getModifiers(fn)?.some((m) => m.kind === ts.SyntaxKind.AsyncKeyword) ?? false;
    if (isAsync || (ts.isFunctionExpression(fn) && fn.asteriskToken)) {
      throw this.error("Accessor must be a plain synchronous function", ExpressionParseErrorCode.INVALID_LAMBDA, fn);
    }

    const body = fn.body;
    if (!ts.isBlock(body)) {
      return body;
    }
    const only = body.statements[0];
    if (body.statements.length !== 1 || only === undefined || !ts.isReturnStatement(only) || !only.expression) {
      throw this.error("Accessor block must contain a single return statement", ExpressionParseErrorCode.INVALID_LAMBDA, body);
    }
    return only.expression;
  }

  private convert(node: ts.Expression): Expression {
    return registerExpression(this.convertNode(node));
  }

  private convertNode(node: ts.Expression): Expression {
    const span = this.spanOf(node);

    if (ts.isParenthesizedExpression(node) || ts.isNonNullExpression(node) || ts.isSatisfiesExpression(node)) {
      return this.convert(node.expression);
    }

    if (ts.isAsExpression(node) || ts.isTypeAssertionExpression(node)) {
      return {
        $kind: "Convert",
        span,
        type: node.type.getText(this.sourceFile),
        operand: this.convert(node.expression),
      };
    }

    if (ts.isIdentifier(node)) {
      return { $kind: "Constant", span, value: this.bind(node) };
    }

    if (node.kind === ts.SyntaxKind.ThisKeyword) {
      return { $kind: "Constant", span, value: this.lookup("this", node) };
    }

    if (ts.isPropertyAccessExpression(node)) {
      if (ts.isPrivateIdentifier(node.name)) {
        throw this.error("Private names cannot be read from outside their class", ExpressionParseErrorCode.UNSUPPORTED_SYNTAX, node.name);
      }
      return {
        $kind: "AccessMember",
        span,
        object: this.convert(node.expression),
        member: { kind: "property", name: node.name.text },
        optional: node.questionDotToken !== undefined,
      };
    }

    if (ts.isElementAccessExpression(node)) {
      return {
        $kind: "AccessKeyed",
        span,
        object: this.convert(node.expression),
        key: this.convert(node.argumentExpression),
        optional: node.questionDotToken !== undefined,
      };
    }

    if (ts.isCallExpression(node)) {
      const args = node.arguments.map((arg) => {
        if (ts.isSpreadElement(arg)) {
          throw this.error("Spread arguments are not supported", ExpressionParseErrorCode.UNSUPPORTED_SYNTAX, arg);
        }
        return this.convert(arg);
      });
      const callee = skipParentheses(node.expression);
      if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.name)) {
        return {
          $kind: "CallMember",
          span,
          object: this.convert(callee.expression),
          name: callee.name.text,
          args,
          optional: callee.questionDotToken !== undefined || node.questionDotToken !== undefined,
        };
      }
      return { $kind: "CallFunction", span, func: this.convert(node.expression), args };
    }

    if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
      return { $kind: "Constant", span, value: node.text };
    }
    if (ts.isNumericLiteral(node)) {
      return { $kind: "Constant", span, value: Number(node.text) };
    }
    if (ts.isBigIntLiteral(node)) {
      return { $kind: "Constant", span, value: BigInt(node.text.slice(0, -1)) };
    }
    switch (node.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return { $kind: "Constant", span, value: true };
      case ts.SyntaxKind.FalseKeyword:
        return { $kind: "Constant", span, value: false };
      case ts.SyntaxKind.NullKeyword:
        return { $kind: "Constant", span, value: null };
      default:
        break;
    }

    if (ts.isPrefixUnaryExpression(node)) {
      const operand = this.convert(node.operand);
      switch (node.operator) {
        case ts.SyntaxKind.ExclamationToken:
          return { $kind: "Unary", span, operation: "!", expression: operand };
        case ts.SyntaxKind.MinusToken:
          return { $kind: "Unary", span, operation: "-", expression: operand };
        case ts.SyntaxKind.PlusToken:
          return { $kind: "Unary", span, operation: "+", expression: operand };
        default:
          throw this.unsupported(node);
      }
    }
    if (ts.isTypeOfExpression(node)) {
      return { $kind: "Unary", span, operation: "typeof", expression: this.convert(node.expression) };
    }
    if (ts.isVoidExpression(node)) {
      return { $kind: "Unary", span, operation: "void", expression: this.convert(node.expression) };
    }

    if (ts.isBinaryExpression(node)) {
      const operation = BINARY_OPERATORS.get(node.operatorToken.kind);
      if (operation === undefined) {
        throw this.unsupported(node);
      }
      return {
        $kind: "Binary",
        span,
        operation,
        left: this.convert(node.left),
        right: this.convert(node.right),
      };
    }

    if (ts.isConditionalExpression(node)) {
      return {
        $kind: "Conditional",
        span,
        condition: this.convert(node.condition),
        yes: this.convert(node.whenTrue),
        no: this.convert(node.whenFalse),
      };
    }

    throw this.unsupported(node);
  }

  private bind(node: ts.Identifier): unknown {
    const name = node.text;
    if (Object.hasOwn(this.closure, name)) {
      return this.closure[name];
    }
    if (LITERAL_IDENTIFIERS.has(name)) {
      return LITERAL_IDENTIFIERS.get(name);
    }
    throw this.error(`'${name}' is not bound in the accessor closure`, ExpressionParseErrorCode.UNBOUND_IDENTIFIER, node);
  }

  private lookup(name: string, node: ts.Node): unknown {
    if (!Object.hasOwn(this.closure, name)) {
      throw this.error(`'${name}' is not bound in the accessor closure`, ExpressionParseErrorCode.UNBOUND_IDENTIFIER, node);
    }
    return this.closure[name];
  }

  private spanOf(node: ts.Node): TextSpan {
    return {
      start: node.getStart(this.sourceFile) - PREFIX.length,
      end: node.getEnd() - PREFIX.length,
    };
  }

  private unsupported(node: ts.Node): ExpressionParseError {
    return this.error(
      `Unsupported syntax in accessor: ${ts.SyntaxKind[node.kind]}`,
      ExpressionParseErrorCode.UNSUPPORTED_SYNTAX,
      node,
    );
  }

  private error(message: string, code: ExpressionParseErrorCodeType, node?: ts.Node): ExpressionParseError {
    return new ExpressionParseError(message, code, this.source, node ? this.spanOf(node) : undefined);
  }
}

/** `parseDiagnostics` is filled by createSourceFile but left off the public SourceFile type. */
function parseDiagnosticsOf(sourceFile: ts.SourceFile): readonly ts.Diagnostic[] {
  const value: unknown = Reflect.get(sourceFile, "parseDiagnostics");
  return Array.isArray(value) ? value.filter(isDiagnostic) : [];
}

function isDiagnostic(value: unknown): value is ts.Diagnostic {
  return typeof value === "object" && value !== null && "messageText" in value && "category" in value;
}

function skipParentheses(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}
