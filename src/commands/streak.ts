import { Context } from "telegraf";
import { t } from "../streaks/locales";
import type { BotServices, Sender } from "./services";

/**
 * Builds the /streak report. Counters are refreshed against the clock first,
 * so a broken run shows up as inactivity.
 */
export async function streakReport(services: BotServices, from: Sender): Promise<string> {
  const { engine, selector } = services;
  const outcome = await engine.advance(from.id, false, { username: from.username });
  const language = outcome.subject.language;
  const s = t(language);

  const doneToday = await engine.hasCompletedOnLocalDay(
    from.id,
    engine.localNow(outcome.subject),
  );
  const body = await selector.streakMessage(outcome, language, true);

  return [s.streakTitle, doneToday ? s.doneToday : s.notDoneToday, body].join("\n\n");
}

/**
 * Handles the /streak command.
 */
export async function handleStreak(ctx: Context, services: BotServices, from: Sender) {
  await ctx.reply(await streakReport(services, from));
}
