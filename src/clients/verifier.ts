import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import type { ServiceResult, VerifierPayload } from "../types";
import { executeServiceCall } from "./http";
import { CallOptions, IMAGE_CONTENT_TYPES, VerifierClientLike, VerifierInput, imageExtension } from "./types";

const Score = z.number().finite().min(0).max(1);

// `confidence` is the documented field; older deployments answer with `score`.
export const VerifierResponseSchema = z
  .object({
    confidence: Score.optional(),
    score: Score.optional(),
    verified: z.boolean().optional(),
    person_id: z.string().nullable().optional()
  })
  .passthrough()
  .transform((body, ctx): VerifierPayload => {
    const score = body.confidence ?? body.score;
    if (score === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence"],
        message: "Expected a numeric confidence (or score) field"
      });
      return z.NEVER;
    }
    return {
      score,
      verified: body.verified ?? null,
      personId: body.person_id ?? null
    };
  });

export interface VerifierClientOptions {
  baseUrl: string;
  http?: AxiosInstance;
}

export class VerifierClient implements VerifierClientLike {
  readonly id = "verifier" as const;

  private readonly endpoint: string;

  private readonly http: AxiosInstance;

  constructor({ baseUrl, http = axios.create() }: VerifierClientOptions) {
    this.endpoint = `${baseUrl.replace(/\/+$/, "")}/verify`;
    this.http = http;
  }

  call(input: VerifierInput, options: CallOptions): Promise<ServiceResult<VerifierPayload>> {
    return executeServiceCall(
      {
        service: this.id,
        url: this.endpoint,
        schema: VerifierResponseSchema,
        send: (signal) =>
          this.http.post<unknown>(this.endpoint, buildVerifyForm(input), {
            signal,
            headers: input.requestId ? { "X-Request-Id": input.requestId } : undefined
          })
      },
      options
    );
  }
}

export function buildVerifyForm(input: VerifierInput): FormData {
  const extension = imageExtension(input.filename);
  const type = extension ? IMAGE_CONTENT_TYPES[extension] : "application/octet-stream";
  const form = new FormData();
  form.append("file", new Blob([input.image], { type }), input.filename);
  return form;
}
