import { z } from "zod";

export const LANGUAGES = ["en", "ar"] as const;

export type Language = (typeof LANGUAGES)[number];

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

/**
 * Day-count boundaries used to pick message tone.
 */
export type ThresholdDays = 1 | 3 | 5 | 7 | 30;

export type TemplateType = "reward" | "warning";

/**
 * Kind of a sent reminder.
 * - daily: one of the subject's configured reminder times
 * - endOfDay: the once-a-day "streak at risk" / "come back" notice
 */
export type ReminderKind = "daily" | "endOfDay";

export const subjectSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  timezone: z.string(),
  language: z.enum(LANGUAGES),
  currentStreak: z.number().int().nonnegative(),
  reverseStreak: z.number().int().nonnegative(),
  lastCheckInIso: z.string().nullable(), // moves only on a completion
  reminderTimes: z.array(z.string()), // "HH:MM", unique
  createdAtIso: z.string(),
});

/**
 * A tracked user.
 */
export type Subject = z.infer<typeof subjectSchema>;

/**
 * The part of a subject the streak engine reads and writes.
 */
export type StreakState = Pick<
  Subject,
  "currentStreak" | "reverseStreak" | "lastCheckInIso"
>;

export type StreakCounts = Pick<Subject, "currentStreak" | "reverseStreak">;

export const checkInSchema = z.object({
  id: z.string(),
  subjectId: z.number().int(),
  atIso: z.string(),
  completed: z.boolean(),
});

export type CheckInEvent = z.infer<typeof checkInSchema>;

export const sentReminderSchema = z.object({
  id: z.string(),
  subjectId: z.number().int(),
  kind: z.enum(["daily", "endOfDay"]),
  timeOfDay: z.string(),
  sentAtIso: z.string(),
});

export type SentReminderRecord = z.infer<typeof sentReminderSchema>;

export const messageTemplateSchema = z.object({
  id: z.string(),
  templateType: z.enum(["reward", "warning"]),
  thresholdDays: z.union([
    z.literal(1),
    z.literal(3),
    z.literal(5),
    z.literal(7),
    z.literal(30),
  ]),
  textEn: z.string().default(""),
  textAr: z.string().default(""),
  messageEn: z.string().default(""),
  messageAr: z.string().default(""),
});

export type MessageTemplate = z.infer<typeof messageTemplateSchema>;

export const dailyReminderTextSchema = z.object({
  id: z.string(),
  textEn: z.string(),
  textAr: z.string(),
});

export type DailyReminderText = z.infer<typeof dailyReminderTextSchema>;

/**
 * Reference data shipped with the bot.
 */
export const seedFileSchema = z.object({
  templates: z.array(messageTemplateSchema),
  dailyReminders: z.array(dailyReminderTextSchema),
});

export type SeedFile = z.infer<typeof seedFileSchema>;

/**
 * The store file structure
 */
export const storeFileSchema = seedFileSchema.extend({
  version: z.literal(1),
  subjects: z.array(subjectSchema),
  checkIns: z.array(checkInSchema),
  sentReminders: z.array(sentReminderSchema),
});

export type StoreFile = z.infer<typeof storeFileSchema>;

export const CURRENT_STORE_VERSION = 1;
