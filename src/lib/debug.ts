import { DEBUG_EVALUATION } from "@/config/debug";

/** Subsystem tag prefixed to every debug line, e.g. "[evaluate]". */
export type DebugScope = "evaluate" | "cache" | "import" | "status";

export const isDev = () => process.env.NODE_ENV !== "production";

const enabled = () => DEBUG_EVALUATION && isDev();

export const dlog = (scope: DebugScope, ...args: unknown[]) => {
  if (enabled()) console.log(`[${scope}]`, ...args);
};

export const dwarn = (scope: DebugScope, ...args: unknown[]) => {
  if (enabled()) console.warn(`[${scope}]`, ...args);
};

/** Errors are logged in any non-production run, flag or not. */
export const derr = (scope: DebugScope, ...args: unknown[]) => {
  if (isDev()) console.error(`[${scope}]`, ...args);
};
