/**
 * Runs the Engine Health registry against the dev fixtures.
 * Run from repo root: npx tsx __dev__/engineHealthCheck.ts
 * Exits 0 if no check fails (warnings allowed), non-zero otherwise.
 */

import { runAllChecks } from "../src/dev/healthChecks";

function run(): number {
  const { results, durationMs } = runAllChecks();
  let failed = false;
  for (const r of results) {
    const line = `[engineHealthCheck] ${r.status.toUpperCase()} ${r.group} / ${r.name}: ${r.message}`;
    if (r.status === "fail") {
      console.error(line);
      failed = true;
    } else if (r.status === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
  console.log(`[engineHealthCheck] ${results.length} checks in ${durationMs.toFixed(1)}ms`);
  return failed ? 1 : 0;
}

process.exit(run());
