import { describe, it } from "node:test";
import assert from "node:assert";
import { evaluateTable } from "@/engine/evaluate/evaluateTable";
import { createEvaluationCache } from "@/engine/evaluate/evaluationCache";
import { createSystemStatus } from "./systemStatus";

function record(neighborhoodId: string, year: number, index: number, crimeCount: number) {
  return {
    neighborhoodId,
    period: { year, index },
    crimeCount,
    deathsInIntervention: 0,
    arrests: 0,
    weaponsSeized: 0,
    drugsSeizedKg: 0,
    officersInvolved: 0,
    operationType: "none",
  };
}

const table = [
  record("centro", 2024, 11, 12),
  record("centro", 2024, 12, 14),
  record("restinga", 2025, 1, 20),
  record("restinga", 2025, 2, -4),
  record("azenha", 2025, 3, -1),
];

const loadedAt = new Date("2025-03-01T00:00:00.000Z");

describe("createSystemStatus", () => {
  it("reports stale and empty before any evaluation", () => {
    const status = createSystemStatus();
    assert.deepStrictEqual(status.snapshot(loadedAt), {
      lastLoadedAt: null,
      ageHours: null,
      stale: true,
      latestPeriod: null,
      neighborhoods: 0,
      failedNeighborhoods: 0,
      rejectedRecords: 0,
      cacheHitRate: null,
    });
  });

  it("summarizes the last evaluation", () => {
    const status = createSystemStatus();
    status.recordEvaluation(evaluateTable(table), loadedAt);
    const snap = status.snapshot(new Date("2025-03-01T06:00:00.000Z"));
    assert.strictEqual(snap.lastLoadedAt, "2025-03-01T00:00:00.000Z");
    assert.strictEqual(snap.ageHours, 6);
    assert.strictEqual(snap.stale, false);
    assert.deepStrictEqual(snap.latestPeriod, { year: 2025, index: 1 });
    assert.strictEqual(snap.neighborhoods, 2);
    assert.strictEqual(snap.failedNeighborhoods, 1);
    assert.strictEqual(snap.rejectedRecords, 2);
  });

  it("turns stale past the configured age", () => {
    const status = createSystemStatus({ staleAfterHours: 12 });
    status.recordEvaluation(evaluateTable(table), loadedAt);
    assert.strictEqual(status.snapshot(new Date("2025-03-01T12:00:00.000Z")).stale, false);
    assert.strictEqual(status.snapshot(new Date("2025-03-01T13:00:00.000Z")).stale, true);
  });

  it("reads the hit rate from an attached cache", () => {
    const status = createSystemStatus();
    const cache = createEvaluationCache();
    status.attachCache(cache.stats);
    assert.strictEqual(status.snapshot(loadedAt).cacheHitRate, null);
    cache.evaluate(table);
    cache.evaluate(table);
    cache.evaluate(table);
    cache.evaluate(table);
    assert.strictEqual(status.snapshot(loadedAt).cacheHitRate, 0.75);
  });
});
