import type { DateTime } from "luxon";
import type { SentReminderRecord, Subject } from "./schema";
import type { StreakStore } from "./store";
import type { StreakEngine } from "./engine";
import type { KeyedLock } from "./lock";
import { ValidationError } from "../errors";
import { formatTimeOnly, normalizeTimeOfDay, toUtcIso } from "./time";

/**
 * The configured slot matching `nowLocal` to the minute, if any.
 */
export function matchingSlot(times: readonly string[], nowLocal: DateTime): string | null {
  const current = formatTimeOnly(nowLocal);
  for (const time of times) {
    if (normalizeTimeOfDay(time) === current) {
      return current;
    }
  }
  return null;
}

/**
 * Whether a daily reminder for `slot` is among the records of the local day.
 */
export function wasSentToday(records: readonly SentReminderRecord[], slot: string): boolean {
  return records.some((r) => r.kind === "daily" && r.timeOfDay === slot);
}

export type ReminderDeps = {
  store: StreakStore;
  engine: StreakEngine;
};

/**
 * Returns the slot a reminder is due for at `nowLocal`, or null.
 *
 * A slot is due when it matches the local hour and minute, no daily reminder
 * for it was recorded on the local day, and the subject has no completion
 * within the guard window.
 */
export async function findDueSlot(
  subject: Subject,
  nowLocal: DateTime,
  { store, engine }: ReminderDeps,
): Promise<string | null> {
  const slot = matchingSlot(subject.reminderTimes, nowLocal);
  if (!slot) return null;

  const sent = await store.sentRemindersToday(subject.id, toUtcIso(nowLocal.startOf("day")));
  if (wasSentToday(sent, slot)) {
    return null;
  }

  if (await engine.hasCompletedWithinWindow(subject.id, nowLocal)) {
    console.log(`[Scheduler] Subject ${subject.id} already completed, skipping ${slot}`);
    return null;
  }

  return slot;
}

export async function isDue(
  subject: Subject,
  nowLocal: DateTime,
  deps: ReminderDeps,
): Promise<boolean> {
  return (await findDueSlot(subject, nowLocal, deps)) !== null;
}

function requireTime(value: string): string {
  const time = normalizeTimeOfDay(value);
  if (!time) {
    throw new ValidationError(`Invalid time '${value}', expected HH:MM (24-hour)`);
  }
  return time;
}

function sortTimes(times: Iterable<string>): string[] {
  return [...times].sort();
}

/**
 * Adds a reminder time. Returns false if it was already set.
 * @throws ValidationError for a malformed time
 */
export async function addReminderTime(
  store: StreakStore,
  lock: KeyedLock,
  subjectId: number,
  value: string,
): Promise<boolean> {
  const time = requireTime(value);
  return lock.run(subjectId, async () => {
    const times = await store.getReminderTimes(subjectId);
    if (times.includes(time)) {
      return false;
    }
    await store.setReminderTimes(subjectId, sortTimes([...times, time]));
    console.log(`[Scheduler] Subject ${subjectId} added reminder at ${time}`);
    return true;
  });
}

/**
 * Removes a reminder time. Returns false if it was not set.
 * @throws ValidationError for a malformed time
 */
export async function removeReminderTime(
  store: StreakStore,
  lock: KeyedLock,
  subjectId: number,
  value: string,
): Promise<boolean> {
  const time = requireTime(value);
  return lock.run(subjectId, async () => {
    const times = await store.getReminderTimes(subjectId);
    if (!times.includes(time)) {
      return false;
    }
    await store.setReminderTimes(
      subjectId,
      times.filter((t) => t !== time),
    );
    console.log(`[Scheduler] Subject ${subjectId} removed reminder at ${time}`);
    return true;
  });
}

export async function listReminderTimes(store: StreakStore, subjectId: number): Promise<string[]> {
  return sortTimes(await store.getReminderTimes(subjectId));
}
