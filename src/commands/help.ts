import { Context, Markup } from "telegraf";
import { t } from "../streaks/locales";
import { languageFor, type BotServices, type Sender } from "./services";

/**
 * Handles the /help command.
 * Lists all available slash commands in the sender's language.
 */
export async function handleHelp(ctx: Context, services: BotServices, from: Sender) {
  const language = await languageFor(services, from);

  await ctx.reply(t(language).help, {
    reply_markup: Markup.keyboard([["/streak", "/listreminders"], ["/help"]]).resize()
      .reply_markup,
  });
}
