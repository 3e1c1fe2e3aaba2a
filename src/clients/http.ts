import axios, { AxiosResponse } from "axios";
import type { ZodType, ZodTypeDef } from "zod";
import { formatIssues } from "../parsers/request-schema";
import type { ServiceId, ServiceResult } from "../types";
import {
  OrchestrationCancelledError,
  TIMED_OUT,
  describeError,
  elapsedMs,
  linkAbortController,
  truncate,
  withTimeout
} from "../utils";
import type { CallOptions } from "./types";

const TIMEOUT_ERROR_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export interface ServiceCallSpec<P> {
  service: ServiceId;
  url: string;
  send: (signal: AbortSignal) => Promise<AxiosResponse<unknown>>;
  schema: ZodType<P, ZodTypeDef, unknown>;
}

/**
 * Runs one outbound request under its own timeout and classifies the outcome.
 *
 * Failures come back as values. The only rejection is {@link OrchestrationCancelledError}, raised
 * when the caller's signal aborts before the call settles.
 */
export async function executeServiceCall<P>(spec: ServiceCallSpec<P>, options: CallOptions): Promise<ServiceResult<P>> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw new OrchestrationCancelledError();
  }

  const startedAt = Date.now();
  const { controller, release } = linkAbortController(signal);

  try {
    const outcome = await withTimeout(
      spec.send(controller.signal).then(
        (response) => ({ ok: true as const, response }),
        (error: unknown) => ({ ok: false as const, error })
      ),
      timeoutMs,
      () => controller.abort(new Error(`${spec.service} call exceeded ${timeoutMs}ms`))
    );

    if (signal?.aborted) {
      throw new OrchestrationCancelledError();
    }

    const latencyMs = elapsedMs(startedAt);

    if (outcome === TIMED_OUT) {
      return {
        status: "timeout",
        error: { message: `${spec.service} did not respond within ${timeoutMs}ms` },
        latencyMs
      };
    }

    if (!outcome.ok) {
      return classifyTransportFailure(spec, outcome.error, timeoutMs, latencyMs);
    }

    const { response } = outcome;
    if (response.status < 200 || response.status >= 300) {
      return {
        status: "transport_error",
        error: {
          message: `${spec.service} responded with HTTP ${response.status}`,
          httpStatus: response.status,
          body: summarizeBody(response.data)
        },
        latencyMs
      };
    }

    const parsed = spec.schema.safeParse(response.data);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      console.warn(`${spec.service} response from ${spec.url} failed validation`, issues);
      return {
        status: "invalid_response",
        error: {
          message: `${spec.service} response did not match the expected shape: ${issues.join("; ")}`,
          httpStatus: response.status,
          body: summarizeBody(response.data)
        },
        latencyMs
      };
    }

    return { status: "success", payload: parsed.data, latencyMs };
  } finally {
    release();
  }
}

function classifyTransportFailure<P>(
  spec: ServiceCallSpec<P>,
  error: unknown,
  timeoutMs: number,
  latencyMs: number
): ServiceResult<P> {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        status: "transport_error",
        error: {
          message: `${spec.service} responded with HTTP ${error.response.status}`,
          httpStatus: error.response.status,
          body: summarizeBody(error.response.data)
        },
        latencyMs
      };
    }
    if (error.code && TIMEOUT_ERROR_CODES.has(error.code)) {
      return {
        status: "timeout",
        error: { message: `${spec.service} did not respond within ${timeoutMs}ms` },
        latencyMs
      };
    }
  }

  console.warn(`${spec.service} request to ${spec.url} failed`, describeError(error));
  return {
    status: "transport_error",
    error: { message: `${spec.service} request failed: ${describeError(error)}` },
    latencyMs
  };
}

function summarizeBody(body: unknown): unknown {
  return typeof body === "string" ? truncate(body) : body;
}
