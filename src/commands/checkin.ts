import { Context } from "telegraf";
import { TransientStoreError } from "../errors";
import { t } from "../streaks/locales";
import { languageFor, type BotServices, type Sender } from "./services";

/**
 * Records a completion and returns the reply: the completion message, the
 * already-completed notice, or a retry notice when the store is unavailable.
 */
export async function checkInReply(services: BotServices, from: Sender): Promise<string> {
  try {
    const outcome = await services.engine.advance(from.id, true, { username: from.username });
    const language = outcome.subject.language;
    if (outcome.status === "alreadyCompleted") {
      return services.selector.alreadyCompletedMessage(language);
    }
    return await services.selector.completionMessage(outcome, language);
  } catch (e) {
    if (!(e instanceof TransientStoreError)) throw e;
    console.error(`[Bot] Check-in for ${from.id} failed: ${e.message}`);
    return t(await languageFor(services, from)).retry;
  }
}

/**
 * Handles a message containing a check mark.
 */
export async function handleCheckIn(ctx: Context, services: BotServices, from: Sender) {
  await ctx.reply(await checkInReply(services, from));
}
