import { describe, it, after } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { evaluateTable } from "@/engine/evaluate/evaluateTable";
import {
  normalizeHeader,
  parseIndicatorWorkbook,
  readIndicatorFile,
  rowsToIndicatorInputs,
} from "./indicatorImport";

function workbookBytes(rows: unknown[][]): Uint8Array {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Indicadores");
  return new Uint8Array(XLSX.write(wb, { type: "array", bookType: "xlsx" }));
}

const sheetRows: unknown[][] = [
  ["Bairro", "Ano", "Index", "Crimes", "Mortes", "Arrests", "Weapons", "Drugs kg", "Officers", "Operation"],
  ["Centro ", 2024, 3, 15, 0, 8, 2, "1,2", 4, "Patrol"],
  [],
  ["Restinga", 2024, 3, 40, 1, 0, 0, 0, 12, ""],
];

describe("normalizeHeader", () => {
  it("folds case, accents and punctuation", () => {
    assert.strictEqual(normalizeHeader("Crimes (total)"), "crimestotal");
    assert.strictEqual(normalizeHeader("Prisões"), "prisoes");
    assert.strictEqual(normalizeHeader("  Drugs_Seized kg "), "drugsseizedkg");
  });
});

describe("parseIndicatorWorkbook", () => {
  it("reads headers and skips empty rows", () => {
    const parsed = parseIndicatorWorkbook(workbookBytes(sheetRows));
    assert.deepStrictEqual(parsed.headers, sheetRows[0]);
    assert.strictEqual(parsed.rows.length, 2);
    assert.strictEqual(parsed.rows[1]["Bairro"], "Restinga");
  });
});

describe("rowsToIndicatorInputs", () => {
  it("maps aliased columns to indicator fields", () => {
    const inputs = rowsToIndicatorInputs(parseIndicatorWorkbook(workbookBytes(sheetRows)));
    assert.deepStrictEqual(inputs[0], {
      neighborhoodId: "Centro",
      period: { year: 2024, index: 3 },
      crimeCount: 15,
      deathsInIntervention: 0,
      arrests: 8,
      weaponsSeized: 2,
      drugsSeizedKg: 1.2,
      officersInvolved: 4,
      operationType: "patrol",
    });
    assert.strictEqual(inputs[1].operationType, "none");
  });

  it("produces inputs the engine accepts", () => {
    const inputs = rowsToIndicatorInputs(parseIndicatorWorkbook(workbookBytes(sheetRows)));
    const { results, failures } = evaluateTable(inputs);
    assert.deepStrictEqual(failures, []);
    assert.deepStrictEqual(
      results.map((r) => [r.neighborhoodId, r.score, r.tier]),
      [
        ["Centro", 0, "very_low"],
        ["Restinga", 115, "very_high"],
      ]
    );
  });

  it("reads a CSV with a period column and leaves blanks for validation", () => {
    const csv = "neighborhood,period,crimes,deaths,arrests,weapons,drugskg,officers,operation\nrestinga,2024-05,12,,3,0,0,2,\n";
    const inputs = rowsToIndicatorInputs(parseIndicatorWorkbook(new TextEncoder().encode(csv)));
    assert.deepStrictEqual(inputs, [
      {
        neighborhoodId: "restinga",
        period: "2024-05",
        crimeCount: 12,
        deathsInIntervention: undefined,
        arrests: 3,
        weaponsSeized: 0,
        drugsSeizedKg: 0,
        officersInvolved: 2,
        operationType: "none",
      },
    ]);
    assert.strictEqual(evaluateTable(inputs).failures[0].rejected[0].period, "2024-05");
  });
});

describe("readIndicatorFile", () => {
  const dir = mkdtempSync(join(tmpdir(), "indicator-import-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it("reads a workbook from disk", () => {
    const path = join(dir, "indicadores.xlsx");
    writeFileSync(path, workbookBytes(sheetRows));
    const inputs = readIndicatorFile(path);
    assert.deepStrictEqual(
      inputs.map((i) => i.neighborhoodId),
      ["Centro", "Restinga"]
    );
  });
});
