/**
 * Debug flags for development. Defaults must be false for production.
 * Evaluation logging (rejected records, cache evictions) is gated by DEBUG_EVALUATION.
 */
export const DEBUG_EVALUATION = process.env.DEBUG_EVALUATION === "1";
