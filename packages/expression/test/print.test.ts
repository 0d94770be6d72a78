import { describe, it, expect } from "vitest";
import { parseLambda, printExpression, Expr } from "@fieldkit/expression";

class Model {
  count = 1;
  address = { city: "Springfield" };
  getTitle(): string {
    return "title";
  }
}

describe("printExpression", () => {
  const model = new Model();

  it("prints member chains with the owner's constructor name", () => {
    expect(printExpression(parseLambda("() => model.address.city", { model }).body))
      .toBe("<const Model>.address.city");
  });

  it("prints calls with their arguments", () => {
    expect(printExpression(parseLambda("() => model.getTitle(1, 'x')", { model }).body))
      .toBe('<const Model>.getTitle(1, "x")');
  });

  it("prints conversions and optional links", () => {
    expect(printExpression(parseLambda("() => model.count as unknown", { model }).body))
      .toBe("(<const Model>.count as unknown)");
    expect(printExpression(parseLambda("() => model?.address", { model }).body))
      .toBe("<const Model>?.address");
  });

  it("prints operators", () => {
    expect(printExpression(parseLambda("() => model.count > 0 ? -model.count : null", { model }).body))
      .toBe("((<const Model>.count > 0) ? -<const Model>.count : null)");
    expect(printExpression(parseLambda("() => typeof model", { model }).body))
      .toBe("typeof <const Model>");
  });

  it("prints lambdas", () => {
    expect(printExpression(Expr.lambda(Expr.property(model, "count")))).toBe("() => <const Model>.count");
  });
});
