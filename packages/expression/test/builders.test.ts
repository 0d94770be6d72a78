import { describe, it, expect } from "vitest";
import { Expr, isExpression, isLambda, evaluate, parseLambda } from "@fieldkit/expression";

describe("Expr builders", () => {
  const model = { address: { city: "Springfield" }, count: 2 };

  it("wraps chain roots in Constant nodes", () => {
    const node = Expr.property(model, "count");
    expect(node).toEqual({
      $kind: "AccessMember",
      object: { $kind: "Constant", value: model },
      member: { kind: "property", name: "count" },
      optional: false,
    });
  });

  it("chains through existing expression nodes", () => {
    const node = Expr.field(Expr.property(model, "address"), "city");
    expect(node.object.$kind).toBe("AccessMember");
    expect(node.member).toEqual({ kind: "field", name: "city" });
    expect(evaluate(node)).toBe("Springfield");
  });

  it("wraps user objects that look like nodes", () => {
    const inner = { title: "inner" };
    const lookalike = { $kind: "Constant", value: inner, title: "outer" };
    const node = Expr.property(lookalike, "title");
    expect(node.object).toEqual({ $kind: "Constant", value: lookalike });
    expect(evaluate(node)).toBe("outer");
  });

  it("chains through parsed nodes", () => {
    const parsed = parseLambda("() => model.address", { model }).body;
    const node = Expr.field(parsed, "city");
    expect(node.object).toBe(parsed);
    expect(evaluate(node)).toBe("Springfield");
  });

  it("freezes built nodes", () => {
    const node = Expr.property(model, "count");
    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.object)).toBe(true);
    expect(Object.isFrozen(Expr.lambda(node))).toBe(true);
  });

  it("builds nodes the guards recognise", () => {
    const body = Expr.binary("+", Expr.property(model, "count"), Expr.constant(1));
    expect(isExpression(body)).toBe(true);
    expect(isExpression(model)).toBe(false);
    expect(isLambda(Expr.lambda(body))).toBe(true);
    expect(isLambda(body)).toBe(false);
    expect(evaluate(body)).toBe(3);
  });

  it("builds calls, conversions and conditionals", () => {
    const node = Expr.conditional(
      Expr.unary("!", Expr.constant(false)),
      Expr.convert(Expr.callMember(Expr.constant("abc"), "toUpperCase"), "unknown"),
      Expr.constant(null),
    );
    expect(evaluate(node)).toBe("ABC");
  });
});
