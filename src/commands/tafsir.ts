import { Context } from "telegraf";
import { formatExplanation } from "../ai/tafsir";
import { t } from "../streaks/locales";
import type { Language } from "../streaks/schema";
import { downloadPhotoAsDataUrl } from "../telegram/download";
import { languageFor, type BotServices, type Sender } from "./services";

async function replyWithExplanation(
  ctx: Context,
  language: Language,
  explain: () => Promise<string>,
) {
  const s = t(language);
  await ctx.reply(s.processing);
  try {
    await ctx.reply(await explain());
  } catch (e) {
    console.error("[Bot] Error explaining verse:", e);
    await ctx.reply(s.explainFailed);
  }
}

/**
 * Explains a verse sent as text (Arabic text or a reference such as 2:255).
 */
export async function handleTafsirText(
  ctx: Context,
  services: BotServices,
  from: Sender,
  text: string,
) {
  const language = await languageFor(services, from);
  await replyWithExplanation(ctx, language, async () =>
    formatExplanation(await services.explainer.explainText(text, language), language),
  );
}

/**
 * Explains a verse sent as a photo. `fileId` is the largest photo size.
 */
export async function handleTafsirPhoto(
  ctx: Context,
  services: BotServices,
  from: Sender,
  fileId: string,
) {
  const language = await languageFor(services, from);
  await replyWithExplanation(ctx, language, async () => {
    const dataUrl = await downloadPhotoAsDataUrl(ctx, fileId);
    return formatExplanation(await services.explainer.explainImage(dataUrl, language), language);
  });
}
