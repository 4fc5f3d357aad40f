import { beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidSignalError } from "../errors";
import { SignalStore } from "../signalStore";
import { MINUTE, T0 } from "./fixtures";

describe("SignalStore", () => {
  const now = vi.fn(() => T0);
  let store: SignalStore;

  beforeEach(() => {
    now.mockReset();
    now.mockReturnValue(T0);
    store = new SignalStore({ now, retentionMs: 60 * MINUTE, clockSkewToleranceMs: 2 * MINUTE });
  });

  function ids(service: string, from = T0 - 60 * MINUTE, to = T0): string[] {
    return Array.from(store.query(service, undefined, { from, to })).map((signal) => signal.id);
  }

  it("returns ingested signals in timestamp order, ties broken by id", () => {
    store.ingest({ id: "s1", service: "cartservice", kind: "log", timestamp: T0 - 1_000 });
    store.ingest({ id: "s2", service: "cartservice", kind: "log", timestamp: T0 - 3_000 });
    store.ingest({ id: "s4", service: "cartservice", kind: "log", timestamp: T0 - 2_000 });
    store.ingest({ id: "s3", service: "cartservice", kind: "log", timestamp: T0 - 2_000 });
    store.ingest({ id: "other", service: "frontend", kind: "log", timestamp: T0 - 2_000 });

    expect(ids("cartservice")).toEqual(["s2", "s3", "s4", "s1"]);
    expect(ids("frontend")).toEqual(["other"]);
  });

  it("freezes stored signals and normalizes attributes to strings", () => {
    store.ingest({
      id: "deploy-1",
      service: "cartservice",
      kind: "deployment",
      timestamp: T0 - MINUTE,
      attributes: { version: "1.4.2", replicas: 3, canary: true },
    });

    const [signal] = Array.from(store.query("cartservice", undefined, { from: 0, to: T0 }));
    expect(signal.severity).toBe("info");
    expect(signal.attributes).toEqual({ version: "1.4.2", replicas: "3", canary: "true" });
    expect(Object.isFrozen(signal)).toBe(true);
    expect(Object.isFrozen(signal.attributes)).toBe(true);
  });

  it("keeps the original record for a duplicate id and takes the latest attributes", () => {
    expect(
      store.ingest({
        id: "dup",
        service: "cartservice",
        kind: "log",
        timestamp: T0 - 5_000,
        attributes: { message: "first" },
      }),
    ).toBe("accepted");
    expect(
      store.ingest({
        id: "dup",
        service: "cartservice",
        kind: "log",
        timestamp: T0 - 500,
        attributes: { message: "second" },
      }),
    ).toBe("duplicate");

    const signals = Array.from(store.query("cartservice", undefined, { from: 0, to: T0 }));
    expect(signals).toHaveLength(1);
    expect(signals[0].timestamp).toBe(T0 - 5_000);
    expect(signals[0].attributes).toEqual({ message: "second" });
  });

  it("rejects timestamps beyond the clock-skew tolerance", () => {
    expect(() =>
      store.ingest({ id: "future", service: "cartservice", kind: "log", timestamp: T0 + 2 * MINUTE + 1 }),
    ).toThrow(InvalidSignalError);
    expect(
      store.ingest({ id: "edge", service: "cartservice", kind: "log", timestamp: T0 + 2 * MINUTE }),
    ).toBe("accepted");
  });

  it("rejects unknown kinds and malformed records", () => {
    expect(() =>
      store.ingest({ id: "x", service: "cartservice", kind: "profile", timestamp: T0 }),
    ).toThrow(InvalidSignalError);
    expect(() => store.ingest({ id: "y", kind: "log", timestamp: T0 })).toThrow(InvalidSignalError);
    expect(() =>
      store.ingest({ id: "z", service: "cartservice", kind: "log", timestamp: Number.NaN }),
    ).toThrow(InvalidSignalError);
    expect(store.stats().signalCount).toBe(0);
  });

  it("reports per-record outcomes for a batch without aborting on bad records", () => {
    const result = store.ingestBatch([
      { id: "a", service: "cartservice", kind: "log", timestamp: T0 - 1_000 },
      { id: "a", service: "cartservice", kind: "log", timestamp: T0 - 1_000 },
      { id: "b", service: "cartservice", kind: "profile", timestamp: T0 },
      { service: "cartservice", kind: "log", timestamp: T0 },
      { id: "c", service: "cartservice", kind: "metric", timestamp: T0 - 2_000, numericValue: 97 },
    ]);

    expect(result.accepted).toBe(2);
    expect(result.duplicates).toBe(1);
    expect(result.rejected.map((rejection) => [rejection.index, rejection.id])).toEqual([
      [2, "b"],
      [3, undefined],
    ]);
    expect(ids("cartservice")).toEqual(["c", "a"]);
  });

  it("filters by kind and returns nothing for an inverted range", () => {
    store.ingest({ id: "log-1", service: "cartservice", kind: "log", timestamp: T0 - 3_000 });
    store.ingest({ id: "dep-1", service: "cartservice", kind: "deployment", timestamp: T0 - 2_000 });
    store.ingest({ id: "met-1", service: "cartservice", kind: "metric", timestamp: T0 - 1_000 });

    const range = { from: T0 - MINUTE, to: T0 };
    expect(Array.from(store.query("cartservice", ["deployment"], range)).map((s) => s.id)).toEqual([
      "dep-1",
    ]);
    expect(Array.from(store.query("cartservice", [], range))).toHaveLength(3);
    expect(Array.from(store.query("cartservice", undefined, { from: T0, to: T0 - MINUTE }))).toEqual([]);
    expect(Array.from(store.query("unknown", undefined, range))).toEqual([]);
  });

  it("includes both range bounds", () => {
    store.ingest({ id: "lo", service: "cartservice", kind: "log", timestamp: T0 - MINUTE });
    store.ingest({ id: "hi", service: "cartservice", kind: "log", timestamp: T0 });
    store.ingest({ id: "out", service: "cartservice", kind: "log", timestamp: T0 - MINUTE - 1 });

    expect(ids("cartservice", T0 - MINUTE, T0)).toEqual(["lo", "hi"]);
  });

  it("yields the same sequence for repeated queries", () => {
    for (let index = 0; index < 20; index += 1) {
      store.ingest({
        id: `sig-${index}`,
        service: "cartservice",
        kind: index % 2 === 0 ? "log" : "metric",
        timestamp: T0 - index * 1_000,
      });
    }

    const iterable = store.query("cartservice", undefined, { from: T0 - MINUTE, to: T0 });
    const first = Array.from(iterable);
    const second = Array.from(iterable);
    expect(second).toEqual(first);
    expect(first).toHaveLength(20);
  });

  it("iterates a stable snapshot while ingestion continues", () => {
    store.ingest({ id: "a", service: "cartservice", kind: "log", timestamp: T0 - 3_000 });
    store.ingest({ id: "c", service: "cartservice", kind: "log", timestamp: T0 - 1_000 });

    const iterator = store
      .query("cartservice", undefined, { from: T0 - MINUTE, to: T0 })
      [Symbol.iterator]();
    expect(iterator.next().value?.id).toBe("a");

    store.ingest({ id: "b", service: "cartservice", kind: "log", timestamp: T0 - 2_000 });

    expect(iterator.next().value?.id).toBe("c");
    expect(iterator.next().done).toBe(true);
    expect(ids("cartservice")).toEqual(["a", "b", "c"]);
  });

  it("evicts signals older than the retention window", () => {
    store.ingest({ id: "old", service: "cartservice", kind: "log", timestamp: T0 - 61 * MINUTE });
    store.ingest({ id: "edge", service: "cartservice", kind: "log", timestamp: T0 - 60 * MINUTE });
    store.ingest({ id: "fresh", service: "cartservice", kind: "log", timestamp: T0 - MINUTE });
    store.ingest({ id: "gone", service: "adservice", kind: "log", timestamp: T0 - 90 * MINUTE });

    expect(store.evictExpired(T0)).toBe(2);
    expect(ids("cartservice", 0, T0)).toEqual(["edge", "fresh"]);
    expect(store.stats()).toEqual({
      signalCount: 2,
      serviceCount: 1,
      oldestTimestamp: T0 - 60 * MINUTE,
      newestTimestamp: T0 - MINUTE,
    });
  });
});
