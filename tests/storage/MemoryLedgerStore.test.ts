import { describe, it, expect } from "vitest";
import { MemoryLedgerStore } from "../../src/storage/index.js";
import { Ledger, emptySnapshot } from "../../src/ledger/Ledger.js";

describe("MemoryLedgerStore", () => {
  it("should load an empty ledger by default", async () => {
    const store = new MemoryLedgerStore();

    expect(await store.load()).toEqual(emptySnapshot());
  });

  it("should return what was saved", async () => {
    const store = new MemoryLedgerStore();
    const ledger = Ledger.fromSnapshot(emptySnapshot());
    ledger.createGroup("trip", ["Alice", "Bob"]).pay(100, "Alice", "Bob");

    await store.save(ledger.toSnapshot());

    expect(await store.load()).toEqual(ledger.toSnapshot());
  });

  it("should not share state with callers", async () => {
    const store = new MemoryLedgerStore();
    const snapshot = emptySnapshot();
    await store.save(snapshot);

    snapshot.currentGroup = "changed";
    const loaded = await store.load();
    loaded.groups.push({ name: "x", currency: "EUR", members: [], log: [] });

    expect(await store.load()).toEqual(emptySnapshot());
  });
});
