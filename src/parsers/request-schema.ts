import { z } from "zod";
import { CHATBOT_PROVIDERS, IMAGE_CONTENT_TYPES, imageExtension } from "../clients/types";

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const ImageBase64 = z
  .string()
  .transform((value) => value.replace(/^data:[^;]+;base64,/, "").replace(/\s+/g, ""))
  .refine((value) => value.length > 0 && BASE64_PATTERN.test(value), { message: "Must be a base64 encoded image" })
  .transform((value) => Buffer.from(value, "base64"));

const Filename = z
  .string()
  .min(1)
  .refine((value) => imageExtension(value) !== null, {
    message: `Image extension must be one of: ${Object.keys(IMAGE_CONTENT_TYPES).map((ext) => `.${ext}`).join(", ")}`
  });

// Form fields arrive as strings; the uploaded file is attached by multer as `image`.
export const IdentifyRequestSchema = z.object({
  query: z.string().trim().min(1).max(2_000),
  image: z.object(
    {
      buffer: z.instanceof(Buffer).refine((buffer) => buffer.length > 0, { message: "Image file is empty" }),
      filename: Filename
    },
    { required_error: "An image file is required" }
  ),
  provider: z.enum(CHATBOT_PROVIDERS).optional(),
  k: z.coerce.number().int().positive().max(50).optional()
});

export const IdentifyPersonArgsSchema = z.object({
  image_base64: ImageBase64,
  filename: Filename.default("image.jpg")
});

export const AskNormativaArgsSchema = z.object({
  query: z.string().trim().min(1),
  provider: z.enum(CHATBOT_PROVIDERS).optional(),
  k: z.coerce.number().int().positive().max(50).optional()
});

export const LatestTracesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(1)
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}
