import { describe, it } from "node:test";
import assert from "node:assert";
import type { IndicatorRecord } from "@/domain/indicator/indicator.schema";
import { resolveEngineConfig } from "@/config/engineConfig";
import { TIER_RECOMMENDATIONS } from "@/engine/recommendations/recommend";
import { evaluateTable } from "./evaluateTable";

function rec(
  neighborhoodId: string,
  month: number,
  crimeCount: number,
  extra: Partial<IndicatorRecord> = {}
): IndicatorRecord {
  return {
    neighborhoodId,
    period: { year: 2024, index: month },
    crimeCount,
    deathsInIntervention: 0,
    arrests: 0,
    weaponsSeized: 0,
    drugsSeizedKg: 0,
    officersInvolved: 0,
    operationType: "none",
    ...extra,
  };
}

describe("evaluateTable", () => {
  it("scores a policed neighborhood down to very_low", () => {
    const { results, failures } = evaluateTable([
      rec("centro", 3, 15, { arrests: 8, weaponsSeized: 2, drugsSeizedKg: 1.2, operationType: "patrol" }),
    ]);
    assert.deepStrictEqual(failures, []);
    assert.strictEqual(results.length, 1);
    const r = results[0];
    assert.strictEqual(r.neighborhoodId, "centro");
    assert.deepStrictEqual(r.period, { year: 2024, index: 3 });
    assert.strictEqual(r.score, 0);
    assert.strictEqual(r.tier, "very_low");
    assert.strictEqual(r.dominantIndicator, "arrests");
    // (8 + 2·2 + 1.2) / 15
    assert(r.effectivenessRatio !== null && Math.abs(r.effectivenessRatio - 0.88) < 1e-9);
    assert.strictEqual(r.forecast, undefined);
    assert.strictEqual(r.trend, undefined);
    assert.deepStrictEqual(r.recommendations, [...TIER_RECOMMENDATIONS.very_low]);
    assert.deepStrictEqual(r.rejected, []);
  });

  it("forecasts from the period series and maps predictions back to periods", () => {
    const records = [6, 2, 4, 1, 5, 3].map((m) => rec("restinga", m, 5 + 2 * (m - 1)));
    const config = resolveEngineConfig({ forecastHorizon: 2 });
    const [r] = evaluateTable(records, config).results;
    assert(r.forecast);
    assert.deepStrictEqual(
      r.forecast.map((p) => p.period),
      [
        { year: 2024, index: 7 },
        { year: 2024, index: 8 },
      ]
    );
    assert(Math.abs(r.forecast[0].predictedCrimeCount - 17) < 1e-9);
    assert(Math.abs(r.forecast[1].predictedCrimeCount - 19) < 1e-9);
    assert.strictEqual(r.trend, "rising");
    // latest period (June) drives score: 15 crimes, nothing else
    assert.deepStrictEqual(r.period, { year: 2024, index: 6 });
    assert.strictEqual(r.score, 15);
    assert.strictEqual(r.tier, "medium");
    assert.strictEqual(r.effectivenessRatio, null);
  });

  it("rolls a forecast across a year boundary", () => {
    const records = [rec("sarandi", 11, 4), rec("sarandi", 12, 6)];
    const config = resolveEngineConfig({ forecastHorizon: 1 });
    const [r] = evaluateTable(records, config).results;
    assert(r.forecast);
    assert.deepStrictEqual(r.forecast[0].period, { year: 2025, index: 1 });
    assert(Math.abs(r.forecast[0].predictedCrimeCount - 8) < 1e-9);
  });

  it("accepts ISO month periods alongside (year, index) periods", () => {
    const records = [rec("bom-fim", 1, 4), { ...rec("bom-fim", 2, 6), period: "2024-02-15" }];
    const [r] = evaluateTable(records).results;
    assert.deepStrictEqual(r.period, { year: 2024, index: 2 });
    assert.strictEqual(r.forecast?.length, 7);
  });

  it("rejects invalid records without aborting their neighborhood or the table", () => {
    const { results, failures } = evaluateTable([
      rec("centro", 1, 10),
      rec("centro", 2, -3),
      rec("azenha", 1, 5, { period: { year: 2024, index: 13 } }),
      rec("cristal", 1, 2),
    ]);

    assert.deepStrictEqual(
      results.map((r) => r.neighborhoodId),
      ["centro", "cristal"]
    );
    const centro = results[0];
    assert.strictEqual(centro.rejected.length, 1);
    assert.strictEqual(centro.rejected[0].neighborhoodId, "centro");
    assert.strictEqual(centro.rejected[0].period, "2024-P02");
    assert(centro.rejected[0].issues[0].startsWith("crimeCount:"));
    assert.strictEqual(centro.forecast, undefined);

    assert.strictEqual(failures.length, 1);
    assert.strictEqual(failures[0].neighborhoodId, "azenha");
    assert.deepStrictEqual(failures[0].rejected, [
      {
        neighborhoodId: "azenha",
        period: "2024-P13",
        issues: ["period: not a valid period for 12 periods per year"],
      },
    ]);
  });

  it("rejects the later of two records for the same period", () => {
    const { results } = evaluateTable([rec("cidade-baixa", 4, 9), rec("cidade-baixa", 4, 30)]);
    const [r] = results;
    assert.strictEqual(r.score, 9);
    assert.deepStrictEqual(r.rejected, [
      { neighborhoodId: "cidade-baixa", period: "2024-P04", issues: ["period: duplicate period in series"] },
    ]);
    assert.strictEqual(r.forecast, undefined);
  });

  it("groups records without a usable id under unknown", () => {
    const { results, failures } = evaluateTable([rec("centro", 1, 1), { crimeCount: 3 }, null]);
    assert.strictEqual(results.length, 1);
    assert.strictEqual(failures.length, 1);
    assert.strictEqual(failures[0].neighborhoodId, "unknown");
    assert.strictEqual(failures[0].rejected.length, 2);
  });

  it("aggregates the configured window", () => {
    const records = [rec("partenon", 1, 10), rec("partenon", 2, 20)];
    assert.strictEqual(evaluateTable(records).results[0].tier, "medium");
    const all = evaluateTable(records, resolveEngineConfig({ aggregationWindow: "all" })).results[0];
    assert.strictEqual(all.score, 30);
    assert.strictEqual(all.tier, "medium_high");
  });

  it("leads with the use-of-force review when deaths dominate", () => {
    const [r] = evaluateTable([rec("restinga", 3, 40, { deathsInIntervention: 1, operationType: "raid" })]).results;
    assert.strictEqual(r.score, 113);
    assert.strictEqual(r.tier, "very_high");
    assert.strictEqual(r.dominantIndicator, "deathsInIntervention");
    assert.strictEqual(r.effectivenessRatio, 0);
    assert.deepStrictEqual(r.recommendations.slice(0, 2), [
      "Review use-of-force protocols: deaths in police interventions are the main driver of this score",
      "Increase operational presence: current enforcement effectiveness is low for this risk level",
    ]);
    assert.deepStrictEqual(
      r.alerts.map((a) => a.type),
      ["INTERVENTION_DEATHS", "HIGH_VOLUME"]
    );
  });

  it("does not mutate its input", () => {
    const records = [rec("centro", 2, 12), rec("centro", 1, 8)];
    const before = JSON.stringify(records);
    evaluateTable(records);
    assert.strictEqual(JSON.stringify(records), before);
  });
});
