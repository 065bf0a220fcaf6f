import { z } from "zod";
import { askAi, type AiMessage, type AiOptions } from "../openrouter/client";
import type { Language } from "../streaks/schema";

export const explanationSchema = z.object({
  isQuranVerse: z.boolean(),
  surahNumber: z.number().int().positive().nullable().default(null),
  ayahNumber: z.number().int().positive().nullable().default(null),
  surahName: z.string().nullable().default(null),
  verseText: z.string().nullable().default(null),
  explanation: z.string(),
});

export type VerseExplanation = z.infer<typeof explanationSchema>;

/**
 * Identifies a verse from text or an image and explains it.
 */
export interface VerseExplainer {
  explainText(text: string, language: Language): Promise<VerseExplanation>;
  /** @param imageDataUrl a `data:image/...;base64,` URL */
  explainImage(imageDataUrl: string, language: Language): Promise<VerseExplanation>;
}

const LANGUAGE_NAMES: Record<Language, string> = {
  en: "English",
  ar: "Arabic",
};

function systemPrompt(language: Language): string {
  return `You identify Quran verses and explain them (tafsir) in simple, easy-to-understand language.

Given a text or an image, decide whether it contains a verse of the Quran.
If it does, identify the surah and ayah and give a short explanation drawn from
well-known classical tafsir (Ibn Kathir, al-Tabari, al-Sa'di).
If it does not, say so briefly in "explanation".

Rules:
- Write "explanation" and "surahName" in ${LANGUAGE_NAMES[language]}.
- "verseText" is the Arabic text of the verse, or null.
- Use null for any field you cannot determine.
- Return STRICT JSON only, no markdown, no extra text.

Format:
{"isQuranVerse":true,"surahNumber":1,"ayahNumber":2,"surahName":"Al-Fatihah","verseText":"...","explanation":"..."}`;
}

/**
 * Extracts and validates the JSON object in an AI reply.
 */
export function parseExplanation(reply: string): VerseExplanation {
  const jsonMatch = reply.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error(`Could not find explanation JSON in: ${reply}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch (e) {
    throw new Error(`Failed to parse explanation JSON: ${e}`);
  }

  const parsed = explanationSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid explanation JSON: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Plain-text rendering of an explanation for a chat reply.
 */
export function formatExplanation(result: VerseExplanation, language: Language): string {
  if (!result.isQuranVerse) {
    return result.explanation;
  }

  const lines: string[] = [];
  if (result.surahNumber !== null && result.ayahNumber !== null) {
    const reference = `${result.surahNumber}:${result.ayahNumber}`;
    const name = result.surahName ? ` ${result.surahName}` : "";
    lines.push(`📖${name} (${reference})`);
  } else if (result.surahName) {
    lines.push(`📖 ${result.surahName}`);
  }
  if (result.verseText) {
    lines.push(result.verseText);
  }
  lines.push(`${language === "ar" ? "التفسير" : "Tafsir"}:\n${result.explanation}`);
  return lines.join("\n\n");
}

export type AskAi = (messages: AiMessage[], options?: AiOptions) => Promise<string>;

/**
 * Explainer backed by OpenRouter chat completions.
 */
export class OpenRouterVerseExplainer implements VerseExplainer {
  constructor(private readonly ask: AskAi = askAi) {}

  async explainText(text: string, language: Language): Promise<VerseExplanation> {
    const reply = await this.ask([
      { role: "system", content: systemPrompt(language) },
      { role: "user", content: text },
    ]);
    return parseExplanation(reply);
  }

  async explainImage(imageDataUrl: string, language: Language): Promise<VerseExplanation> {
    const reply = await this.ask([
      { role: "system", content: systemPrompt(language) },
      {
        role: "user",
        content: [
          { type: "text", text: "Identify and explain the Quran verse in this image." },
          { type: "image_url", image_url: { url: imageDataUrl } },
        ],
      },
    ]);
    return parseExplanation(reply);
  }
}
