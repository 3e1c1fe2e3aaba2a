import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import type { ChatbotPayload, ServiceResult } from "../types";
import { executeServiceCall } from "./http";
import { CallOptions, ChatbotClientLike, ChatbotInput, ChatbotProvider } from "./types";

const ChatbotBodySchema = z
  .object({
    answer: z.string().optional(),
    response: z.string().optional()
  })
  .passthrough();

export function chatbotResponseSchema(provider: ChatbotProvider) {
  return ChatbotBodySchema.transform((body, ctx): ChatbotPayload => {
    const answer = body.answer ?? body.response;
    if (answer === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["answer"],
        message: "Expected a string answer (or response) field"
      });
      return z.NEVER;
    }
    return { answer, provider };
  });
}

export interface ChatbotClientOptions {
  baseUrl: string;
  defaultProvider: ChatbotProvider;
  defaultTopK: number;
  http?: AxiosInstance;
}

export class ChatbotClient implements ChatbotClientLike {
  readonly id = "chatbot" as const;

  private readonly endpoint: string;

  private readonly http: AxiosInstance;

  constructor(private readonly options: ChatbotClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/`;
    this.http = options.http ?? axios.create();
  }

  call(input: ChatbotInput, options: CallOptions): Promise<ServiceResult<ChatbotPayload>> {
    const provider = input.provider ?? this.options.defaultProvider;
    const body = {
      message: input.message,
      provider,
      k: input.k ?? this.options.defaultTopK
    };

    return executeServiceCall(
      {
        service: this.id,
        url: this.endpoint,
        schema: chatbotResponseSchema(provider),
        send: (signal) => this.http.post<unknown>(this.endpoint, body, { signal })
      },
      options
    );
  }
}
