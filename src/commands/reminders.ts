import { Context, Markup } from "telegraf";
import { ValidationError } from "../errors";
import { t } from "../streaks/locales";
import {
  addReminderTime,
  listReminderTimes,
  removeReminderTime,
} from "../streaks/reminders";
import { normalizeTimeOfDay } from "../streaks/time";
import { subjectFor, type BotServices, type Sender } from "./services";

export const DELETE_REMINDER_PREFIX = "delrem:";

/**
 * Applies `/setreminder HH:MM` and returns the reply.
 */
export async function setReminder(
  services: BotServices,
  from: Sender,
  payload: string,
): Promise<string> {
  const subject = await subjectFor(services, from);
  const s = t(subject.language);
  const value = payload.trim();
  if (!value) return s.reminderUsage;

  try {
    const added = await addReminderTime(services.store, services.lock, subject.id, value);
    const time = normalizeTimeOfDay(value) ?? value;
    return added ? s.reminderAdded(time, subject.timezone) : s.reminderExists(time);
  } catch (e) {
    if (e instanceof ValidationError) return s.reminderInvalid(value);
    throw e;
  }
}

export async function listReminders(services: BotServices, from: Sender): Promise<string> {
  const subject = await subjectFor(services, from);
  const s = t(subject.language);
  const times = await listReminderTimes(services.store, subject.id);
  return times.length === 0 ? s.noReminders : s.reminderList(times, subject.timezone);
}

/**
 * Removes one reminder time and returns the reply.
 */
export async function deleteReminder(
  services: BotServices,
  from: Sender,
  value: string,
): Promise<string> {
  const subject = await subjectFor(services, from);
  const s = t(subject.language);
  const time = normalizeTimeOfDay(value) ?? value.trim();

  try {
    const removed = await removeReminderTime(services.store, services.lock, subject.id, value);
    return removed ? s.reminderDeleted(time) : s.reminderNotFound(time);
  } catch (e) {
    if (e instanceof ValidationError) return s.reminderInvalid(time);
    throw e;
  }
}

/**
 * Handles the /setreminder command.
 */
export async function handleSetReminder(
  ctx: Context,
  services: BotServices,
  from: Sender,
  payload: string,
) {
  await ctx.reply(await setReminder(services, from, payload));
}

/**
 * Handles the /listreminders command.
 */
export async function handleListReminders(ctx: Context, services: BotServices, from: Sender) {
  await ctx.reply(await listReminders(services, from));
}

/**
 * Handles the /deletereminder command.
 * Deletes the given time, or shows an inline keyboard of the current ones.
 */
export async function handleDeleteReminder(
  ctx: Context,
  services: BotServices,
  from: Sender,
  payload: string,
) {
  if (payload.trim()) {
    await ctx.reply(await deleteReminder(services, from, payload));
    return;
  }

  const subject = await subjectFor(services, from);
  const s = t(subject.language);
  const times = await listReminderTimes(services.store, subject.id);
  if (times.length === 0) {
    await ctx.reply(s.noReminders);
    return;
  }

  const buttons = times.map((time) => [
    Markup.button.callback(`❌ ${time}`, `${DELETE_REMINDER_PREFIX}${time}`),
  ]);
  await ctx.reply(s.chooseReminderToDelete, {
    reply_markup: Markup.inlineKeyboard(buttons).reply_markup,
  });
}

/**
 * Handles the callback of a delete-reminder button.
 */
export async function handleDeleteReminderCallback(
  ctx: Context,
  services: BotServices,
  from: Sender,
  time: string,
): Promise<void> {
  await ctx.answerCbQuery();
  await ctx.editMessageText(await deleteReminder(services, from, time));
}
