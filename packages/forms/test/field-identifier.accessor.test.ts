/**
 * Forms Package - FieldIdentifier from accessor expressions
 */

import { describe, it, expect } from "vitest";
import { Expr, EvaluationError, parseLambda } from "@fieldkit/expression";
import { FieldIdentifier, FieldIdentifierError } from "@fieldkit/forms";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

class Address {
  city = "Springfield";
  postal = { code: { value: "12345" } };
}

class Order {
  title = "Draft";
  count = 3;
  items = [{ name: "first" }];
  addressReads = 0;
  private readonly _address = new Address();

  get address(): Address {
    this.addressReads++;
    return this._address;
  }

  getTitle(): string {
    return this.title;
  }

  getAddress(): Address {
    return this._address;
  }
}

describe("FieldIdentifier.create(accessor) / owner resolution", () => {
  it("resolves a captured owner", () => {
    const model = new Order();
    const id = FieldIdentifier.create(parseLambda("() => model.title", { model }));
    expect(id.owner).toBe(model);
    expect(id.fieldName).toBe("title");
  });

  it("evaluates a nested owner chain exactly once", () => {
    const model = new Order();
    const id = FieldIdentifier.create(parseLambda("() => model.address.city", { model }));
    expect(model.addressReads).toBe(1);
    expect(id.owner).toBe(model.address);
    expect(id.fieldName).toBe("city");
  });

  it("never reads the final member", () => {
    let reads = 0;
    const model = {
      get secret(): string {
        reads++;
        return "hidden";
      },
    };
    const id = FieldIdentifier.create(parseLambda("() => model.secret", { model }));
    expect(id.fieldName).toBe("secret");
    expect(reads).toBe(0);
  });

  it("resolves four-level chains to the last owner", () => {
    const model = new Order();
    const code = model.address.postal.code;
    const id = FieldIdentifier.create(parseLambda("() => model.address.postal.code.value", { model }));
    expect(id.owner).toBe(code);
    expect(id.fieldName).toBe("value");
  });

  it("equals the identifier built directly from the same pair", () => {
    const model = new Order();
    const fromAccessor = FieldIdentifier.create(parseLambda("() => model.address.city", { model }));
    const direct = FieldIdentifier.create(model.address, "city");
    expect(fromAccessor.equals(direct)).toBe(true);
    expect(fromAccessor.hashCode()).toBe(direct.hashCode());
  });

  it("accepts hand-built trees with field members", () => {
    const model = new Order();
    const id = FieldIdentifier.create(Expr.lambda(Expr.field(model, "count")));
    expect(id.owner).toBe(model);
    expect(id.fieldName).toBe("count");
  });

  it("keeps a node-shaped model as the owner of hand-built trees", () => {
    const model = { $kind: "Constant", value: { title: "inner" }, title: "outer" };
    const id = FieldIdentifier.create(Expr.lambda(Expr.property(model, "title")));
    expect(id.owner).toBe(model);
    expect(id.fieldName).toBe("title");
  });

  it("parses accessor functions through fromAccessor", () => {
    const model = { address: { city: "Springfield" } };
    const id = FieldIdentifier.fromAccessor(() => model.address.city, { model });
    expect(id.equals(FieldIdentifier.create(model.address, "city"))).toBe(true);
  });
});

describe("FieldIdentifier.create(accessor) / widening conversions", () => {
  it("resolves `as unknown` like the uncast form", () => {
    const model = new Order();
    const cast = FieldIdentifier.create(parseLambda("() => model.count as unknown", { model }));
    const plain = FieldIdentifier.create(parseLambda("() => model.count", { model }));
    expect(cast.equals(plain)).toBe(true);
    expect(cast.owner).toBe(model);
    expect(cast.fieldName).toBe("count");
  });

  it("strips only one widening conversion", () => {
    const model = new Order();
    const err = captureError(() =>
      FieldIdentifier.create(parseLambda("() => (model.count as unknown) as unknown", { model })),
    );
    expect(err).toMatchObject({ code: "UnsupportedExpressionShape" });
  });

  it("does not strip conversions to other types", () => {
    const model = new Order();
    const err = captureError(() =>
      FieldIdentifier.create(parseLambda("() => model.count as number", { model })),
    );
    expect(err).toMatchObject({ code: "UnsupportedExpressionShape" });
  });
});

describe("FieldIdentifier.create(accessor) / unsupported shapes", () => {
  it("rejects method calls", () => {
    const model = new Order();
    const err = captureError(() => FieldIdentifier.create(parseLambda("() => model.getTitle()", { model })));
    expect(err).toBeInstanceOf(FieldIdentifierError);
    expect(err).toMatchObject({
      code: "UnsupportedExpressionShape",
      message: "Only member access expressions are supported, got CallMember.",
      expression: "<const Order>.getTitle()",
    });
  });

  it("rejects literals, indexing and arithmetic", () => {
    const model = new Order();
    for (const source of ["() => 'title'", "() => model.items[0]", "() => model.count + 1"]) {
      const err = captureError(() => FieldIdentifier.create(parseLambda(source, { model })));
      expect(err).toMatchObject({ code: "UnsupportedExpressionShape" });
    }
  });

  it("rejects method members", () => {
    const model = new Order();
    const err = captureError(() => FieldIdentifier.create(Expr.lambda(Expr.method(model, "getTitle"))));
    expect(err).toMatchObject({
      code: "UnsupportedMemberKind",
      expression: "<const Order>.getTitle",
    });
  });

  it("rejects owners that are not constants or member chains", () => {
    const model = new Order();
    for (const source of ["() => model.items[0].name", "() => model.getAddress().city"]) {
      const err = captureError(() => FieldIdentifier.create(parseLambda(source, { model })));
      expect(err).toMatchObject({ code: "UnsupportedOwnerExpressionShape" });
    }
  });
});

describe("FieldIdentifier.create(accessor) / owner validation", () => {
  it("rejects an owner chain that evaluates to undefined", () => {
    const model: { address?: Address } = {};
    const err = captureError(() => FieldIdentifier.create(parseLambda("() => model.address.city", { model })));
    expect(err).toMatchObject({
      code: "InvalidArgument",
      argument: "owner",
      message: "The owner of 'city' evaluated to undefined.",
    });
  });

  it("rejects a null captured owner", () => {
    const err = captureError(() => FieldIdentifier.create(parseLambda("() => model.city", { model: null })));
    expect(err).toMatchObject({ code: "InvalidArgument", argument: "owner" });
  });

  it("rejects primitive owners", () => {
    const model = new Order();
    const err = captureError(() => FieldIdentifier.create(parseLambda("() => model.title.length", { model })));
    expect(err).toMatchObject({
      code: "InvalidArgument",
      argument: "owner",
      message: "The owner of 'length' must be an object, got string.",
    });
  });

  it("propagates evaluation failures inside the owner chain", () => {
    const model: { address?: Address } = {};
    const err = captureError(() =>
      FieldIdentifier.create(parseLambda("() => model.address.postal.code", { model })),
    );
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({ code: "NullReference" });
  });
});
