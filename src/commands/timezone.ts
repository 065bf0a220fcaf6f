import { Context } from "telegraf";
import { t } from "../streaks/locales";
import { isValidZone } from "../streaks/time";
import { subjectFor, type BotServices, type Sender } from "./services";

/**
 * Applies `/settimezone <zone>` and returns the reply.
 */
export async function setTimezone(
  services: BotServices,
  from: Sender,
  payload: string,
): Promise<string> {
  const subject = await subjectFor(services, from);
  const s = t(subject.language);
  const zone = payload.trim();

  if (!zone) {
    return `${s.timezoneUsage}\n\n🌍 ${subject.timezone}`;
  }
  if (!isValidZone(zone)) {
    return s.timezoneInvalid(zone);
  }

  await services.lock.run(subject.id, () =>
    services.store.updateProfile(subject.id, { timezone: zone }),
  );
  console.log(`[Bot] Subject ${subject.id} set timezone to ${zone}`);
  return s.timezoneSet(zone);
}

/**
 * Handles the /settimezone command.
 */
export async function handleSetTimezone(
  ctx: Context,
  services: BotServices,
  from: Sender,
  payload: string,
) {
  await ctx.reply(await setTimezone(services, from, payload));
}
