import type { ChatbotPayload, ServiceId, ServicePayloads, ServiceResult, VerifierPayload } from "../types";

export const CHATBOT_PROVIDERS = ["deepseek", "chatgpt"] as const;

export type ChatbotProvider = (typeof CHATBOT_PROVIDERS)[number];

export const IMAGE_CONTENT_TYPES = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png"
} as const;

export type ImageExtension = keyof typeof IMAGE_CONTENT_TYPES;

export interface VerifierInput {
  image: Buffer;
  filename: string;
  requestId?: string;
}

export interface ChatbotInput {
  message: string;
  provider?: ChatbotProvider;
  k?: number;
}

export interface ServiceInputs {
  verifier: VerifierInput;
  chatbot: ChatbotInput;
}

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** A single timed outbound call that always settles into a typed outcome. */
export interface ServiceClient<I, P> {
  readonly id: ServiceId;
  call(input: I, options: CallOptions): Promise<ServiceResult<P>>;
}

export type VerifierClientLike = ServiceClient<VerifierInput, VerifierPayload>;

export type ChatbotClientLike = ServiceClient<ChatbotInput, ChatbotPayload>;

export type ServiceClients = {
  [K in ServiceId]: ServiceClient<ServiceInputs[K], ServicePayloads[K]>;
};

export function imageExtension(filename: string): ImageExtension | null {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) {
    return null;
  }
  const extension = filename.slice(dot + 1).toLowerCase();
  return isImageExtension(extension) ? extension : null;
}

function isImageExtension(value: string): value is ImageExtension {
  return Object.prototype.hasOwnProperty.call(IMAGE_CONTENT_TYPES, value);
}
