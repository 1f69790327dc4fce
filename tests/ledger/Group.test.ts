import { describe, it, expect } from "vitest";
import { Group } from "../../src/ledger/Group.js";
import {
  InvalidNameError,
  InvalidNumberFormatError,
  InvalidSemanticError,
  LogEntryNotFoundError,
  MemberNotFoundError,
} from "../../src/errors.js";

function setupGroup(): Group {
  return Group.create("testgroup", ["Alice", "Bob", "Charly", "Django"]);
}

function balancesOf(group: Group): Record<string, number> {
  return Object.fromEntries(group.balances().map((b): [string, number] => [b.member, b.balance]));
}

describe("Group.create", () => {
  it("should start every member at zero", () => {
    const group = setupGroup();

    expect(group.currency).toBe("EUR");
    expect(group.balances()).toEqual([
      { member: "Alice", balance: 0 },
      { member: "Bob", balance: 0 },
      { member: "Charly", balance: 0 },
      { member: "Django", balance: 0 },
    ]);
  });

  it("should require at least one member", () => {
    expect(() => Group.create("empty", [])).toThrow(InvalidSemanticError);
  });

  it("should reject invalid and duplicate member names", () => {
    expect(() => Group.create("g", ["Alice", "Bob Smith"])).toThrow(InvalidNameError);
    expect(() => Group.create("g", ["Alice", "Alice"])).toThrow(InvalidNameError);
  });
});

describe("Group.apply", () => {
  it("should add the change to the balances", () => {
    const group = Group.create("g", ["Alice", "Bob"]);
    group.apply({ Alice: -10, Bob: 10 });

    expect(balancesOf(group)).toEqual({ Alice: -10, Bob: 10 });
  });

  it("should reject unknown members without touching any balance", () => {
    const group = Group.create("g", ["Alice", "Bob"]);

    expect(() => group.apply({ Alice: -10, Eve: 10 })).toThrow(MemberNotFoundError);
    expect(balancesOf(group)).toEqual({ Alice: 0, Bob: 0 });
  });
});

describe("Group.split", () => {
  it("should apply and log the allocation", () => {
    const group = setupGroup();
    const change = group.split(120, ["Alice"], [], "Lunch");

    expect(change).toEqual({ Alice: 90, Bob: -30, Charly: -30, Django: -30 });
    expect(balancesOf(group)).toEqual({ Alice: 90, Bob: -30, Charly: -30, Django: -30 });
    expect(group.entries()).toHaveLength(1);
    expect(group.getLog().command).toEqual({
      kind: "split",
      name: "Lunch",
      amount: 120,
      from: [{ member: "Alice", amount: null }],
      to: [],
      directives: { from: ["Alice"], to: [] },
      balanceRest: false,
    });
    expect(group.getLog().change).toEqual(change);
  });

  it("should leave the group untouched when the allocation fails", () => {
    const group = setupGroup();

    expect(() => group.split(120, ["Eve"], [], "Lunch")).toThrow(MemberNotFoundError);
    expect(group.entries()).toHaveLength(0);
    expect(balancesOf(group)).toEqual({ Alice: 0, Bob: 0, Charly: 0, Django: 0 });
  });
});

describe("Group.pay", () => {
  it("should credit the payer and debit the receiver", () => {
    const group = setupGroup();
    const change = group.pay(500, "Alice", "Bob");

    expect(change).toEqual({ Alice: 500, Bob: -500 });
    expect(balancesOf(group)).toEqual({ Alice: 500, Bob: -500, Charly: 0, Django: 0 });
    expect(group.getLog().command).toEqual({ kind: "pay", amount: 500, from: "Alice", to: "Bob" });
  });

  it("should reject unknown members", () => {
    const group = setupGroup();

    expect(() => group.pay(500, "Alice", "Eve")).toThrow(MemberNotFoundError);
    expect(() => group.pay(500, "Eve", "Alice")).toThrow(MemberNotFoundError);
    expect(group.entries()).toHaveLength(0);
  });

  it("should reject invalid amounts and self payments", () => {
    const group = setupGroup();

    expect(() => group.pay(0, "Alice", "Bob")).toThrow(InvalidSemanticError);
    expect(() => group.pay(1.5, "Alice", "Bob")).toThrow(InvalidNumberFormatError);
    expect(() => group.pay(100, "Alice", "Alice")).toThrow(InvalidSemanticError);
  });
});

describe("Group.undo", () => {
  it("should remove the latest entry by default", () => {
    const group = setupGroup();
    group.pay(12, "Alice", "Bob");
    group.pay(13, "Alice", "Bob");

    const undone = group.undo();

    expect(undone.command).toEqual({ kind: "pay", amount: 13, from: "Alice", to: "Bob" });
    expect(group.entries()).toHaveLength(1);
    expect(balancesOf(group)).toEqual({ Alice: 12, Bob: -12, Charly: 0, Django: 0 });
  });

  it("should remove an entry by index", () => {
    const group = setupGroup();
    group.pay(12, "Alice", "Bob");
    group.pay(13, "Alice", "Bob");

    group.undo(0);

    expect(group.entries()).toHaveLength(1);
    expect(group.getLog(0).command).toEqual({ kind: "pay", amount: 13, from: "Alice", to: "Bob" });
    expect(balancesOf(group)).toEqual({ Alice: 13, Bob: -13, Charly: 0, Django: 0 });
  });

  it("should restore the balances from before an allocation", () => {
    const group = setupGroup();
    group.pay(700, "Charly", "Django");
    const before = balancesOf(group);

    group.split(140, ["Bob"], ["Alice:0,1", "Charly:0.1"], "Drinks", true);
    group.undo();

    expect(balancesOf(group)).toEqual(before);
    expect(group.entries()).toHaveLength(1);
  });

  it("should fail on an empty log or a missing index", () => {
    const group = setupGroup();

    expect(() => group.undo()).toThrow(LogEntryNotFoundError);

    group.pay(12, "Alice", "Bob");
    expect(() => group.undo(1)).toThrow(LogEntryNotFoundError);
    expect(() => group.undo(-1)).toThrow(LogEntryNotFoundError);
    expect(group.entries()).toHaveLength(1);
  });
});

describe("Group members", () => {
  it("should add new members with a zero balance", () => {
    const group = setupGroup();
    group.addMembers(["Egbert"]);

    expect(group.memberNames()).toEqual(["Alice", "Bob", "Charly", "Django", "Egbert"]);
    expect(group.balanceOf("Egbert")).toBe(0);
  });

  it("should reject duplicates and invalid names without adding anyone", () => {
    const group = setupGroup();

    expect(() => group.addMembers(["Egbert", "Alice"])).toThrow(InvalidNameError);
    expect(() => group.addMembers(["Fritz", "not valid"])).toThrow(InvalidNameError);
    expect(group.memberNames()).toHaveLength(4);
  });

  it("should remove settled members", () => {
    const group = setupGroup();
    group.removeMembers(["Alice"]);

    expect(group.memberNames()).toEqual(["Bob", "Charly", "Django"]);
  });

  it("should refuse to remove unknown members or open balances unless forced", () => {
    const group = setupGroup();
    group.pay(100, "Alice", "Bob");

    expect(() => group.removeMembers(["Theseus"])).toThrow(InvalidNameError);
    expect(() => group.removeMembers(["Alice"])).toThrow(InvalidNameError);
    expect(group.memberNames()).toHaveLength(4);

    group.removeMembers(["Alice"], true);
    expect(group.hasMember("Alice")).toBe(false);
  });
});

describe("Group settlement", () => {
  it("should plan and apply payments that zero every balance", () => {
    const group = setupGroup();
    group.split(120, ["Alice"], [], "Lunch");

    const plan = group.planSettlement();
    expect(plan).toEqual([
      { from: "Bob", to: "Alice", amount: 30 },
      { from: "Charly", to: "Alice", amount: 30 },
      { from: "Django", to: "Alice", amount: 30 },
    ]);

    group.applySettlement(plan);

    expect(balancesOf(group)).toEqual({ Alice: 0, Bob: 0, Charly: 0, Django: 0 });
    expect(group.getLog().command).toEqual({ kind: "settle", transactions: plan });
  });

  it("should make an applied settlement undoable", () => {
    const group = setupGroup();
    group.split(120, ["Alice"], [], "Lunch");
    group.applySettlement(group.planSettlement());

    group.undo();

    expect(balancesOf(group)).toEqual({ Alice: 90, Bob: -30, Charly: -30, Django: -30 });
  });

  it("should reject non-positive settlement amounts", () => {
    const group = setupGroup();

    expect(() => group.applySettlement([{ from: "Alice", to: "Bob", amount: -5 }])).toThrow(
      InvalidSemanticError
    );
    expect(group.entries()).toHaveLength(0);
  });

  it("should reject settlements naming unknown members", () => {
    const group = setupGroup();

    expect(() => group.applySettlement([{ from: "Alice", to: "Eve", amount: 5 }])).toThrow(
      MemberNotFoundError
    );
    expect(group.entries()).toHaveLength(0);
  });

  it("should reject a settlement between a member and themselves", () => {
    const group = setupGroup();

    expect(() => group.applySettlement([{ from: "Bob", to: "Bob", amount: 5 }])).toThrow(
      InvalidSemanticError
    );
    expect(group.entries()).toHaveLength(0);
  });

  it("should settle members whose names exist on Object.prototype", () => {
    const group = Group.create("g", ["constructor", "Bob"]);
    group.split(1000, ["Bob"], [], "Rent");

    const plan = group.planSettlement();
    expect(plan).toEqual([{ from: "constructor", to: "Bob", amount: 500 }]);

    group.applySettlement(plan);

    expect(group.balances()).toEqual([
      { member: "constructor", balance: 0 },
      { member: "Bob", balance: 0 },
    ]);
  });
});

describe("Group.entries", () => {
  it("should hand out copies of the log", () => {
    const group = setupGroup();
    group.pay(12, "Alice", "Bob");

    const entries = group.entries();
    entries[0].change.Alice = 999;
    entries.pop();

    expect(group.entries()).toHaveLength(1);
    expect(group.getLog().change).toEqual({ Alice: 12, Bob: -12 });
  });
});

describe("Group snapshots", () => {
  it("should round-trip balances and log", () => {
    const group = setupGroup();
    group.split(130, ["Bob"], ["Alice:0,1"], "Snacks");
    group.pay(10, "Alice", "Bob");

    const restored = Group.fromSnapshot(group.toSnapshot());

    expect(restored.toSnapshot()).toEqual(group.toSnapshot());
    expect(restored.stats()).toEqual({
      name: "testgroup",
      currency: "EUR",
      members: [
        { member: "Alice", balance: 0 },
        { member: "Bob", balance: 80 },
        { member: "Charly", balance: -40 },
        { member: "Django", balance: -40 },
      ],
    });
  });
});
