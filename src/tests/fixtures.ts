import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import type { CallOptions, ServiceClient } from "../clients/types";
import type { ChatbotPayload, FusionConfig, ServiceId, ServiceResult, VerifierPayload } from "../types";
import { OrchestrationCancelledError } from "../utils";

export const DELTA_CONFIG: FusionConfig = Object.freeze({ threshold: 0.75, margin: 0.1, method: "delta" });

export function verifierSuccess(score: number, personId: string | null = "person-1"): ServiceResult<VerifierPayload> {
  return { status: "success", payload: { score, verified: true, personId }, latencyMs: 12 };
}

export function chatbotSuccess(answer = "Necesitas 240 créditos."): ServiceResult<ChatbotPayload> {
  return { status: "success", payload: { answer, provider: "deepseek" }, latencyMs: 20 };
}

export function failure(status: "timeout" | "transport_error" | "invalid_response"): ServiceResult<never> {
  return { status, error: { message: `simulated ${status}` }, latencyMs: 5 };
}

export interface ScriptedClient<I, P> extends ServiceClient<I, P> {
  calls: Array<{ input: I; options: CallOptions }>;
}

/**
 * Settles with `result` after `delayMs`, or rejects the way a real client does when the caller's
 * signal aborts first.
 */
export function scriptedClient<I, P>(
  id: ServiceId,
  result: ServiceResult<P> | (() => ServiceResult<P>),
  delayMs = 0,
  events?: string[]
): ScriptedClient<I, P> {
  const calls: Array<{ input: I; options: CallOptions }> = [];
  return {
    id,
    calls,
    call(input, options) {
      calls.push({ input, options });
      events?.push(`start:${id}`);
      return new Promise<ServiceResult<P>>((resolve, reject) => {
        const timer = setTimeout(() => {
          events?.push(`end:${id}`);
          resolve(typeof result === "function" ? result() : result);
        }, delayMs);
        options.signal?.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            reject(new OrchestrationCancelledError());
          },
          { once: true }
        );
      });
    }
  };
}

export function jsonResponse(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse<unknown> {
  return { data, status, statusText: status === 200 ? "OK" : "Error", headers: {}, config };
}

export interface RecordingAdapter {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

/** In-process stand-in for the remote service: answers every request with `respond`. */
export function recordingAdapter(
  respond: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse<unknown>>
): RecordingAdapter {
  const requests: InternalAxiosRequestConfig[] = [];
  return {
    requests,
    adapter: (config) => {
      requests.push(config);
      return respond(config);
    }
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
