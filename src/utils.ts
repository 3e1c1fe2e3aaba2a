import type { ResultSet } from "./types";

export const TIME_RANGES = {
  "1h": 60 * 60 * 1000,
  "24h": 24 * 60 * 60 * 1000,
  "7d": 7 * 24 * 60 * 60 * 1000,
  "30d": 30 * 24 * 60 * 60 * 1000
} as const;

export type TimeRangeLabel = keyof typeof TIME_RANGES;

export const DEFAULT_TIME_RANGE: TimeRangeLabel = "24h";

export const TIMED_OUT = Symbol("timed-out");

export class OrchestrationCancelledError extends Error {
  readonly partial: ResultSet;

  constructor(partial: ResultSet = Object.freeze({})) {
    super("Orchestration request was cancelled");
    this.name = "OrchestrationCancelledError";
    this.partial = partial;
  }
}

export function isTimeRangeLabel(value: unknown): value is TimeRangeLabel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(TIME_RANGES, value);
}

// Unknown labels fall back to the default window rather than failing the read.
export function resolveTimeRange(raw: unknown, now: Date = new Date()): { label: TimeRangeLabel; since: Date } {
  const label = isTimeRangeLabel(raw) ? raw : DEFAULT_TIME_RANGE;
  return { label, since: new Date(now.getTime() - TIME_RANGES[label]) };
}

export function elapsedMs(startedAt: number): number {
  return Date.now() - startedAt;
}

/**
 * Races `promise` against a timer. On expiry resolves with {@link TIMED_OUT} and runs `onTimeout`;
 * the original promise keeps running and is the caller's to observe.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      resolve(TIMED_OUT);
      onTimeout?.();
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Child controller that aborts whenever `parent` does. Call `release` once the scope ends so the
 * parent does not keep a listener for every finished call.
 */
export function linkAbortController(parent?: AbortSignal): { controller: AbortController; release: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, release: () => undefined };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => undefined };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return { controller, release: () => parent.removeEventListener("abort", onAbort) };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch (_error) {
    return String(error);
  }
}

export function truncate(value: string, maxLength = 500): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}…` : value;
}
