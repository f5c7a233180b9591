import { describe, it } from "node:test";
import assert from "node:assert";
import type { IndicatorCounts } from "@/domain/indicator/indicator.schema";
import { classify } from "@/config/riskTiers";
import { computeScore, dominantIndicator, scoreContributions } from "./computeScore";

function counts(partial: Partial<IndicatorCounts> = {}): IndicatorCounts {
  return {
    crimeCount: 0,
    deathsInIntervention: 0,
    arrests: 0,
    weaponsSeized: 0,
    drugsSeizedKg: 0,
    officersInvolved: 0,
    operationType: "none",
    ...partial,
  };
}

describe("computeScore", () => {
  it("applies the synergistic weights", () => {
    const score = computeScore(counts({ crimeCount: 40, deathsInIntervention: 1, arrests: 2, weaponsSeized: 1 }));
    assert.strictEqual(score, 101);
  });

  it("subtracts 2 for an active operation", () => {
    assert.strictEqual(computeScore(counts({ crimeCount: 20, operationType: "raid" })), 18);
    assert.strictEqual(computeScore(counts({ crimeCount: 20 })), 20);
  });

  it("clamps to zero when enforcement outweighs crime", () => {
    const score = computeScore(
      counts({ crimeCount: 15, arrests: 8, weaponsSeized: 2, drugsSeizedKg: 1.2, operationType: "patrol" })
    );
    assert.strictEqual(score, 0);
  });

  it("zero crime with enforcement benefits scores 0, not negative", () => {
    assert.strictEqual(computeScore(counts({ arrests: 5, weaponsSeized: 3, operationType: "patrol" })), 0);
  });

  it("accepts a custom weight table", () => {
    const weights = {
      crimeCount: 2,
      deathsInIntervention: 10,
      arrests: -1,
      weaponsSeized: 0,
      drugsSeizedKg: 0,
      activeOperation: 0,
    };
    assert.strictEqual(computeScore(counts({ crimeCount: 5, deathsInIntervention: 1, arrests: 3 }), weights), 17);
  });

  it("reports an overflowing score as unbounded, which classifies as critical", () => {
    const score = computeScore(counts({ crimeCount: 1e308, deathsInIntervention: 1e307 }));
    assert.strictEqual(score, Infinity);
    assert.strictEqual(classify(score), "critical");
  });

  it("deaths strictly increase the score", () => {
    const bases = [
      counts(),
      counts({ crimeCount: 12, arrests: 1 }),
      counts({ crimeCount: 3, arrests: 10, weaponsSeized: 4, operationType: "patrol" }),
    ];
    for (const base of bases) {
      for (let deaths = 0; deaths < 4; deaths++) {
        const lower = computeScore({ ...base, deathsInIntervention: deaths });
        const higher = computeScore({ ...base, deathsInIntervention: deaths + 1 });
        assert(higher > lower, `deaths ${deaths} → ${deaths + 1} should increase score`);
      }
    }
  });

  it("enforcement outcomes never increase the score", () => {
    const base = counts({ crimeCount: 60, deathsInIntervention: 1 });
    for (const field of ["arrests", "weaponsSeized", "drugsSeizedKg"] as const) {
      let previous = computeScore(base);
      for (let n = 1; n <= 20; n++) {
        const next = computeScore({ ...base, [field]: n });
        assert(next <= previous, `${field}=${n} increased score`);
        previous = next;
      }
    }
  });
});

describe("scoreContributions", () => {
  it("returns signed weighted terms without negative zeros", () => {
    const c = scoreContributions(counts({ crimeCount: 40, deathsInIntervention: 1, arrests: 2, weaponsSeized: 1 }));
    assert.deepStrictEqual(c, {
      crimeCount: 40,
      deathsInIntervention: 75,
      arrests: -6,
      weaponsSeized: -8,
      drugsSeizedKg: 0,
      activeOperation: 0,
    });
  });
});

describe("dominantIndicator", () => {
  it("picks the largest magnitude term, including negative ones", () => {
    const c = scoreContributions(
      counts({ crimeCount: 15, arrests: 8, weaponsSeized: 2, drugsSeizedKg: 1.2, operationType: "patrol" })
    );
    assert.strictEqual(dominantIndicator(c), "arrests");
  });

  it("reports deaths when a single death outweighs crime", () => {
    const c = scoreContributions(counts({ crimeCount: 40, deathsInIntervention: 1 }));
    assert.strictEqual(dominantIndicator(c), "deathsInIntervention");
  });

  it("keeps declaration order on ties and defaults to crime count", () => {
    assert.strictEqual(dominantIndicator(scoreContributions(counts())), "crimeCount");
    assert.strictEqual(dominantIndicator(scoreContributions(counts({ crimeCount: 3, arrests: 1 }))), "crimeCount");
  });
});
