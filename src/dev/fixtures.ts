/**
 * Dev-only fixtures for Engine Health checks.
 * Deterministic neighborhood series, same every run.
 */

import type { IndicatorRecord } from "@/domain/indicator/indicator.schema";

function rec(
  neighborhoodId: string,
  month: number,
  crimeCount: number,
  extra: Partial<Omit<IndicatorRecord, "neighborhoodId" | "period" | "crimeCount">> = {}
): IndicatorRecord {
  return {
    neighborhoodId,
    period: { year: 2025, index: month },
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

/**
 * Realistic neighborhoods: quiet, policed, rising, declining, lethal-intervention.
 * Used for invariant checks (no hard-coded expected scores).
 */
export const baselineRecords: IndicatorRecord[] = [
  rec("centro", 1, 22),
  rec("centro", 2, 25, { arrests: 2, officersInvolved: 6, operationType: "patrol" }),
  rec("centro", 3, 27, { arrests: 3, weaponsSeized: 1, officersInvolved: 8, operationType: "patrol" }),
  rec("bom-fim", 1, 4),
  rec("bom-fim", 2, 3),
  rec("bom-fim", 3, 5),
  rec("restinga", 1, 30),
  rec("restinga", 2, 38),
  rec("restinga", 3, 51, { deathsInIntervention: 1, arrests: 4, officersInvolved: 20, operationType: "raid" }),
  rec("menino-deus", 1, 18),
  rec("menino-deus", 2, 12),
  rec("menino-deus", 3, 5, { arrests: 1, drugsSeizedKg: 0.8, operationType: "checkpoint" }),
  rec("farroupilha", 3, 9),
];

/** Edge inputs: negative count, malformed period, duplicate period, empty id. Must not throw. */
export const edgeRecords: unknown[] = [
  rec("centro", 4, -1),
  { ...rec("centro", 5, 10), period: { year: 2025, index: 13 } },
  rec("bom-fim", 3, 7),
  { ...rec("x", 1, 3), neighborhoodId: "" },
  null,
  "not a record",
];
