import { describe, it, expect } from "vitest";
import {
  ApplySettlementBodySchema,
  CreateExpenseBodySchema,
  CreateGroupBodySchema,
  UndoBodySchema,
} from "../../src/api/schemas.js";

describe("request body schemas", () => {
  it("should default the expense name", () => {
    expect(CreateExpenseBodySchema.parse({ amount: 1000, from: ["Alice"] })).toEqual({
      amount: 1000,
      from: ["Alice"],
      name: "",
    });
  });

  it("should reject fractional cents and empty payer lists", () => {
    expect(CreateExpenseBodySchema.safeParse({ amount: 10.5, from: ["Alice"] }).success).toBe(false);
    expect(CreateExpenseBodySchema.safeParse({ amount: 1000, from: [] }).success).toBe(false);
  });

  it("should only accept known currencies", () => {
    expect(CreateGroupBodySchema.safeParse({ name: "trip", members: ["Alice"], currency: "USD" }).success).toBe(
      true
    );
    expect(CreateGroupBodySchema.safeParse({ name: "trip", members: ["Alice"], currency: "CHF" }).success).toBe(
      false
    );
  });

  it("should allow undo without an index", () => {
    expect(UndoBodySchema.parse({})).toEqual({});
    expect(UndoBodySchema.safeParse({ index: -1 }).success).toBe(false);
  });

  it("should require positive settlement amounts", () => {
    expect(
      ApplySettlementBodySchema.safeParse({ transactions: [{ from: "Bob", to: "Alice", amount: 0 }] }).success
    ).toBe(false);
  });
});
