import env, { optionalEnv } from "./env";
import { isLanguage, type Language } from "./streaks/schema";

/**
 * Symbols that mark a message as a completed daily portion.
 */
export const CHECK_MARKS = [
  "✅", // white heavy check mark
  "✔️", // heavy check mark + variation selector
  "✔",
  "✓",
  "☑️", // ballot box with check + variation selector
  "☑",
  "\u{1F5F8}", // light check mark
] as const;

export type SupabaseConfig = {
  url: string;
  key: string;
};

export type AppConfig = {
  defaultTimezone: string;
  defaultLanguage: Language;
  storeFile: string;
  seedFile: string;
  supabase: SupabaseConfig | null;
  reminderTickMs: number;
  endOfDayTickMs: number;
  endOfDayStartHour: number;
  endOfDayEndHour: number;
  tickConcurrency: number;
  storeTimeoutMs: number;
  dispatchTimeoutMs: number;
};

/**
 * Builds the application config from the environment.
 */
export function loadConfig(): AppConfig {
  const language = env("DEFAULT_LANGUAGE", "string", "en");
  if (!isLanguage(language)) {
    throw new Error(`DEFAULT_LANGUAGE must be 'en' or 'ar', got '${language}'`);
  }

  const supabaseUrl = optionalEnv("SUPABASE_URL");
  const supabaseKey = optionalEnv("SUPABASE_KEY");

  return {
    defaultTimezone: env("DEFAULT_TIMEZONE", "string", "America/Los_Angeles"),
    defaultLanguage: language,
    storeFile: env("STORE_FILE", "string", "./streaks.json"),
    seedFile: env("SEED_FILE", "string", "./data/templates.json"),
    supabase:
      supabaseUrl && supabaseKey ? { url: supabaseUrl, key: supabaseKey } : null,
    reminderTickMs: env("REMINDER_TICK_MS", "number", 60_000),
    endOfDayTickMs: env("END_OF_DAY_TICK_MS", "number", 3_600_000),
    endOfDayStartHour: env("END_OF_DAY_START_HOUR", "number", 21),
    endOfDayEndHour: env("END_OF_DAY_END_HOUR", "number", 22),
    tickConcurrency: env("TICK_CONCURRENCY", "number", 8),
    storeTimeoutMs: env("STORE_TIMEOUT_MS", "number", 10_000),
    dispatchTimeoutMs: env("DISPATCH_TIMEOUT_MS", "number", 15_000),
  };
}

/**
 * Checks whether a message contains any recognised check mark.
 */
export function hasCheckMark(text: string): boolean {
  return CHECK_MARKS.some((mark) => text.includes(mark));
}
