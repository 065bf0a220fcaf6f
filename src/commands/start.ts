import { Context, Markup } from "telegraf";
import type { Language } from "../streaks/schema";
import { t } from "../streaks/locales";
import { subjectFor, type BotServices, type Sender } from "./services";

const LANGUAGE_BUTTONS = {
  English: "en",
  "العربية": "ar",
} as const satisfies Record<string, Language>;

const LANGUAGE_PROMPT =
  "🌟 Welcome to Quran Companion! Please select your preferred language:\n" +
  "🌟 مرحبًا بك في رفيق القرآن! يرجى اختيار لغتك المفضلة:";

/**
 * The language picked by a language-keyboard button, or null for any other text.
 */
export function languageFromButton(text: string): Language | null {
  const label = text.trim();
  for (const [button, language] of Object.entries(LANGUAGE_BUTTONS)) {
    if (button === label) return language;
  }
  return null;
}

/**
 * Handles the /start command.
 * Asks for the preferred language with a one-time keyboard.
 */
export async function handleStart(ctx: Context) {
  await ctx.reply(LANGUAGE_PROMPT, {
    reply_markup: Markup.keyboard([Object.keys(LANGUAGE_BUTTONS)]).oneTime().resize()
      .reply_markup,
  });
}

/**
 * Stores the chosen language and returns the welcome guide in it.
 */
export async function selectLanguage(
  services: BotServices,
  from: Sender,
  language: Language,
): Promise<string> {
  const subject = await subjectFor(services, from);
  await services.lock.run(subject.id, () => services.store.updateProfile(subject.id, { language }));
  console.log(`[Bot] Subject ${subject.id} selected language ${language}`);
  return t(language).guide;
}

export async function handleLanguageSelection(
  ctx: Context,
  services: BotServices,
  from: Sender,
  language: Language,
) {
  const guide = await selectLanguage(services, from, language);
  await ctx.reply(guide, { reply_markup: Markup.removeKeyboard().reply_markup });
}
