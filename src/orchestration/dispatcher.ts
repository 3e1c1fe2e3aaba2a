import type { ServiceClients, ServiceInputs } from "../clients/types";
import { SERVICE_IDS, ResultSet, ServiceId } from "../types";
import { OrchestrationCancelledError, describeError } from "../utils";
import { ResultSlots } from "./slots";

export interface DispatchOptions {
  timeouts: Readonly<Record<ServiceId, number>>;
  overallDeadlineMs: number;
  signal?: AbortSignal;
}

type DispatchEnd = "complete" | "deadline" | "cancelled";

export class Dispatcher {
  constructor(private readonly clients: ServiceClients) {}

  /**
   * Runs every service concurrently and resolves with whatever finished before the overall
   * deadline. Services still pending at the deadline are left out of the set and their calls
   * are aborted. Rejects only with {@link OrchestrationCancelledError}, when `signal` aborts.
   */
  dispatch(request: ServiceInputs, options: DispatchOptions): Promise<ResultSet> {
    const { timeouts, overallDeadlineMs, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new OrchestrationCancelledError());
    }

    const slots = new ResultSlots();
    const scope = new AbortController();

    return new Promise<ResultSet>((resolve, reject) => {
      let settled = false;

      const finish = (end: DispatchEnd) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(deadline);
        signal?.removeEventListener("abort", onCancel);

        const snapshot = slots.freeze();
        if (end !== "complete") {
          scope.abort(new Error(end === "deadline" ? "Overall deadline elapsed" : "Request cancelled"));
        }
        if (end === "cancelled") {
          reject(new OrchestrationCancelledError(snapshot));
          return;
        }
        if (end === "deadline") {
          console.warn(
            `Dispatch deadline of ${overallDeadlineMs}ms elapsed with ${Object.keys(snapshot).length}/${SERVICE_IDS.length} services settled`
          );
        }
        resolve(snapshot);
      };

      const onCancel = () => finish("cancelled");
      const deadline = setTimeout(() => finish("deadline"), overallDeadlineMs);
      signal?.addEventListener("abort", onCancel, { once: true });

      Promise.all(SERVICE_IDS.map((id) => this.fill(id, request, slots, timeouts[id], scope.signal))).then(
        () => finish("complete"),
        (error: unknown) => {
          console.error("Dispatch failed unexpectedly", error);
          finish("deadline");
        }
      );
    });
  }

  private async fill<K extends ServiceId>(
    id: K,
    request: ServiceInputs,
    slots: ResultSlots,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<void> {
    const startedAt = Date.now();
    try {
      const result = await this.clients[id].call(request[id], { timeoutMs, signal });
      slots.set(id, result);
    } catch (error) {
      if (error instanceof OrchestrationCancelledError || signal.aborted) {
        return;
      }
      // Clients report failures as values; anything thrown here is a client bug and stays isolated.
      console.error(`${id} client threw instead of returning a result`, error);
      slots.set(id, {
        status: "transport_error",
        error: { message: `${id} client failed: ${describeError(error)}` },
        latencyMs: Date.now() - startedAt
      });
    }
  }
}
