import { z } from "zod";
import env from "../env";

export const aiModels = {
  "GPT 4.1 Mini": "openai/gpt-4.1-mini",
  "Gemini Flash 2.0": "google/gemini-2.0-flash-001",
  "Claude 3.7 Sonnet": "anthropic/claude-3.7-sonnet",
} as const;

export type AiOptions = {
  /** any OpenRouter model id; OPENROUTER_MODEL or Gemini Flash by default */
  model?: string;
  temperature?: number;
};

export type AiContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type AiMessageContent = string | AiContentPart[];

export type AiMessage = {
  role: "user" | "assistant" | "system";
  content: AiMessageContent;
};

const openRouterResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          role: z.string(),
          content: z.string().nullable(),
        }),
      }),
    )
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

export type OpenRouterResponse = z.infer<typeof openRouterResponseSchema>;

/**
 * Sends a chat completion request to OpenRouter.
 */
export async function askAi(messages: AiMessage[], options?: AiOptions): Promise<string> {
  const apiKey = env("OPENROUTER_API_KEY");
  const fetchParams = {
    model: options?.model ?? env("OPENROUTER_MODEL", "string", aiModels["Gemini Flash 2.0"]),
    messages,
    temperature: options?.temperature ?? 0.1,
  };

  const json: unknown = await fetch("https://openrouter.ai/api/v1/chat/completions", {
    method: "POST",
    headers: {
      Authorization: "Bearer " + apiKey,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(fetchParams),
  }).then((res) => res.json());

  const res = openRouterResponseSchema.parse(json);
  const content = res.choices?.[0]?.message.content;
  if (!content) {
    console.error("No content in response:", JSON.stringify(json, null, 2));
    throw new Error(res.error?.message ?? "No content in OpenRouter response");
  }

  return content;
}
