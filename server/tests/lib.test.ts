import { describe, expect, it } from "vitest";
import { ManagedMap } from "../lib/base-service";
import { CircuitBreaker, CircuitOpenError } from "../lib/circuit-breaker";
import { StoreError, isMissingColumnError } from "../lib/errors";
import { fileTimestamp } from "../lib/file-timestamp";
import { serviceRegistry } from "../lib/service-registry";
import { QueryAnalyzerService } from "../services/query-analyzer.service";

describe("ManagedMap", () => {
  it("evicts the least recently used key under lru", () => {
    const map = new ManagedMap<string, number>({ maxSize: 2, strategy: "lru" });
    map.set("a", 1);
    map.set("b", 2);
    map.get("a");
    map.set("c", 3);
    expect(map.keys().sort()).toEqual(["a", "c"]);
  });

  it("evicts in insertion order under fifo", () => {
    const map = new ManagedMap<string, number>({ maxSize: 2, strategy: "fifo" });
    map.set("a", 1);
    map.set("b", 2);
    map.get("a");
    map.set("c", 3);
    expect(map.keys().sort()).toEqual(["b", "c"]);
  });

  it("drops a batch of the oldest entries", () => {
    const map = new ManagedMap<number, number>({ maxSize: 10, strategy: "fifo" });
    for (let i = 0; i < 5; i++) map.set(i, i);
    expect(map.evictOldest(3)).toBe(3);
    expect(map.keys()).toEqual([3, 4]);
    expect(map.evictOldest(10)).toBe(2);
    expect(map.size).toBe(0);
  });

  it("never allows a capacity below one", () => {
    expect(new ManagedMap<string, number>({ maxSize: 0, strategy: "lru" }).maxSize).toBe(1);
  });
});

describe("CircuitBreaker", () => {
  it("reopens when a trial call fails after the cooldown", async () => {
    let clock = 0;
    const circuit = new CircuitBreaker("test", { failureThreshold: 1, successThreshold: 2, cooldownMs: 100 }, () => clock);
    const fail = (): Promise<never> => Promise.reject(new Error("down"));

    await expect(circuit.run(fail)).rejects.toThrow("down");
    expect(circuit.getState()).toBe("open");
    await expect(circuit.run(() => Promise.resolve(1))).rejects.toBeInstanceOf(CircuitOpenError);

    clock = 100;
    expect(circuit.getState()).toBe("half-open");
    await expect(circuit.run(() => Promise.resolve(1))).resolves.toBe(1);
    expect(circuit.getState()).toBe("half-open");
    await expect(circuit.run(fail)).rejects.toThrow("down");
    expect(circuit.snapshot()).toMatchObject({ state: "open", openedAt: 100, retryAfterMs: 100 });
  });
});

describe("isMissingColumnError", () => {
  it("finds the column error anywhere in the cause chain", () => {
    const sqliteError = new Error("table feedback has no column named feedback_text");
    expect(isMissingColumnError(new StoreError("saveFeedback", sqliteError))).toBe(true);
    expect(isMissingColumnError(new Error("no such column: metadata"))).toBe(true);
    expect(isMissingColumnError(new StoreError("saveFeedback", new Error("disk I/O error")))).toBe(false);
    expect(isMissingColumnError("no such column")).toBe(false);
  });
});

describe("fileTimestamp", () => {
  it("formats local time with optional milliseconds", () => {
    const date = new Date(2024, 0, 2, 3, 4, 5, 6);
    expect(fileTimestamp(date)).toBe("20240102_030405");
    expect(fileTimestamp(date, true)).toBe("20240102_030405_006");
  });
});

describe("serviceRegistry", () => {
  it("tracks services until they are destroyed", () => {
    const before = serviceRegistry.getCount();
    const analyzer = new QueryAnalyzerService({ cacheSize: 1 });
    expect(serviceRegistry.getCount()).toBe(before + 1);
    expect(serviceRegistry.getRegisteredNames()).toContain("QueryAnalyzerService");

    analyzer.destroy();
    expect(serviceRegistry.getCount()).toBe(before);
  });
});
