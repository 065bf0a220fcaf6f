import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { nanoid } from "nanoid";
import { z } from "zod";
import {
  isLanguage,
  messageTemplateSchema,
  type CheckInEvent,
  type DailyReminderText,
  type MessageTemplate,
  type ReminderKind,
  type SentReminderRecord,
  type StreakState,
  type Subject,
  type TemplateType,
  type ThresholdDays,
} from "./schema";
import type { ProfileUpdate, StreakStore, SubjectDefaults } from "./store";
import { parseInstant, toUtcIso } from "./time";
import { TransientStoreError, describeError } from "../errors";

type SupabaseResult = {
  data: unknown;
  error: { message: string } | null;
};

const rowId = z.union([z.string(), z.number()]).transform(String);

function isoOrNull(value: string | null): string | null {
  return value ? toUtcIso(parseInstant(value)) : null;
}

const userRowSchema = z.object({
  id: z.coerce.number().int(),
  username: z.string().nullable(),
  timezone: z.string().nullable(),
  language: z.string().nullable(),
  current_streak: z.number().int().nullable(),
  reverse_streak: z.number().int().nullable(),
  last_check_in: z.string().nullable(),
  reminder_times: z.array(z.string()).nullable(),
  created_at: z.string(),
});

type UserRow = z.infer<typeof userRowSchema>;

const checkInRowSchema = z
  .object({
    id: rowId,
    user_id: z.coerce.number().int(),
    at: z.string(),
    completed: z.boolean(),
  })
  .transform(
    (row): CheckInEvent => ({
      id: row.id,
      subjectId: row.user_id,
      atIso: toUtcIso(parseInstant(row.at)),
      completed: row.completed,
    }),
  );

const sentReminderRowSchema = z
  .object({
    id: rowId,
    user_id: z.coerce.number().int(),
    kind: z.enum(["daily", "endOfDay"]),
    time_of_day: z.string(),
    sent_at: z.string(),
  })
  .transform(
    (row): SentReminderRecord => ({
      id: row.id,
      subjectId: row.user_id,
      kind: row.kind,
      timeOfDay: row.time_of_day,
      sentAtIso: toUtcIso(parseInstant(row.sent_at)),
    }),
  );

const templateRowSchema = z
  .object({
    id: rowId,
    template_type: z.enum(["reward", "warning"]),
    threshold_days: messageTemplateSchema.shape.thresholdDays,
    text_en: z.string().nullable(),
    text_ar: z.string().nullable(),
    message_en: z.string().nullable(),
    message_ar: z.string().nullable(),
  })
  .transform(
    (row): MessageTemplate => ({
      id: row.id,
      templateType: row.template_type,
      thresholdDays: row.threshold_days,
      textEn: row.text_en ?? "",
      textAr: row.text_ar ?? "",
      messageEn: row.message_en ?? "",
      messageAr: row.message_ar ?? "",
    }),
  );

const dailyReminderRowSchema = z
  .object({
    id: rowId,
    text_en: z.string().nullable(),
    text_ar: z.string().nullable(),
  })
  .transform(
    (row): DailyReminderText => ({
      id: row.id,
      textEn: row.text_en ?? "",
      textAr: row.text_ar ?? "",
    }),
  );

/**
 * Store backed by a Supabase (PostgREST) database. See supabase/schema.sql.
 *
 * Every request is bounded by `timeoutMs`. Network failures, timeouts and
 * PostgREST errors all surface as TransientStoreError. `fetchImpl` replaces
 * the global fetch for every request.
 */
export class SupabaseStore implements StreakStore {
  private readonly client: SupabaseClient;

  constructor(
    url: string,
    key: string,
    private readonly defaults: SubjectDefaults,
    private readonly timeoutMs: number,
    fetchImpl?: typeof fetch,
  ) {
    this.client = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch: fetchImpl },
    });
  }

  private async request(
    label: string,
    build: (signal: AbortSignal) => PromiseLike<SupabaseResult>,
  ): Promise<unknown> {
    let result: SupabaseResult;
    try {
      result = await build(AbortSignal.timeout(this.timeoutMs));
    } catch (e) {
      throw new TransientStoreError(`${label} failed: ${describeError(e)}`, e);
    }
    if (result.error) {
      throw new TransientStoreError(`${label} failed: ${result.error.message}`, result.error);
    }
    return result.data;
  }

  private toSubject(row: UserRow): Subject {
    return {
      id: row.id,
      username: row.username ?? "",
      timezone: row.timezone ?? this.defaults.timezone,
      language: row.language && isLanguage(row.language) ? row.language : this.defaults.language,
      currentStreak: Math.max(0, row.current_streak ?? 0),
      reverseStreak: Math.max(0, row.reverse_streak ?? 0),
      lastCheckInIso: isoOrNull(row.last_check_in),
      reminderTimes: row.reminder_times ?? [],
      createdAtIso: toUtcIso(parseInstant(row.created_at)),
    };
  }

  async getSubject(id: number): Promise<Subject | null> {
    const data = await this.request(`getSubject(${id})`, (signal) =>
      this.client.from("users").select("*").eq("id", id).abortSignal(signal).maybeSingle(),
    );
    return data ? this.toSubject(userRowSchema.parse(data)) : null;
  }

  async createSubject(id: number, username = ""): Promise<Subject> {
    await this.request(`createSubject(${id})`, (signal) =>
      this.client
        .from("users")
        .upsert(
          {
            id,
            username,
            timezone: this.defaults.timezone,
            language: this.defaults.language,
            current_streak: 0,
            reverse_streak: 0,
            last_check_in: null,
            reminder_times: [],
          },
          { onConflict: "id", ignoreDuplicates: true },
        )
        .abortSignal(signal),
    );
    const subject = await this.getSubject(id);
    if (!subject) {
      throw new TransientStoreError(`createSubject(${id}) did not persist`);
    }
    return subject;
  }

  async updateStreak(id: number, state: StreakState): Promise<void> {
    await this.request(`updateStreak(${id})`, (signal) =>
      this.client
        .from("users")
        .update({
          current_streak: state.currentStreak,
          reverse_streak: state.reverseStreak,
          last_check_in: state.lastCheckInIso,
        })
        .eq("id", id)
        .abortSignal(signal),
    );
  }

  async updateProfile(id: number, update: ProfileUpdate): Promise<void> {
    const row: Record<string, string> = {};
    if (update.username !== undefined) row.username = update.username;
    if (update.timezone !== undefined) row.timezone = update.timezone;
    if (update.language !== undefined) row.language = update.language;
    if (Object.keys(row).length === 0) return;

    await this.request(`updateProfile(${id})`, (signal) =>
      this.client.from("users").update(row).eq("id", id).abortSignal(signal),
    );
  }

  async listSubjects(): Promise<Subject[]> {
    const data = await this.request("listSubjects", (signal) =>
      this.client.from("users").select("*").abortSignal(signal),
    );
    return z
      .array(userRowSchema)
      .parse(data ?? [])
      .map((row) => this.toSubject(row));
  }

  async listSubjectsWithReminders(): Promise<Subject[]> {
    const subjects = await this.listSubjects();
    return subjects.filter((s) => s.reminderTimes.length > 0);
  }

  async appendCheckIn(id: number, atIso: string, completed: boolean): Promise<CheckInEvent> {
    const minute = parseInstant(atIso).startOf("minute");
    const existing = await this.request(`appendCheckIn(${id}) lookup`, (signal) =>
      this.client
        .from("check_ins")
        .select("*")
        .eq("user_id", id)
        .eq("completed", completed)
        .gte("at", toUtcIso(minute))
        .lt("at", toUtcIso(minute.plus({ minutes: 1 })))
        .limit(1)
        .abortSignal(signal),
    );
    const [duplicate] = z.array(checkInRowSchema).parse(existing ?? []);
    if (duplicate) {
      return duplicate;
    }

    const data = await this.request(`appendCheckIn(${id})`, (signal) =>
      this.client
        .from("check_ins")
        .insert({ id: `chk_${nanoid(12)}`, user_id: id, at: atIso, completed })
        .select()
        .abortSignal(signal)
        .single(),
    );
    return checkInRowSchema.parse(data);
  }

  async checkInsSince(id: number, sinceIso: string): Promise<CheckInEvent[]> {
    const data = await this.request(`checkInsSince(${id})`, (signal) =>
      this.client
        .from("check_ins")
        .select("*")
        .eq("user_id", id)
        .gte("at", sinceIso)
        .order("at", { ascending: true })
        .abortSignal(signal),
    );
    return z.array(checkInRowSchema).parse(data ?? []);
  }

  async getReminderTimes(id: number): Promise<string[]> {
    const subject = await this.getSubject(id);
    return subject?.reminderTimes ?? [];
  }

  async setReminderTimes(id: number, times: string[]): Promise<void> {
    await this.request(`setReminderTimes(${id})`, (signal) =>
      this.client
        .from("users")
        .update({ reminder_times: [...new Set(times)] })
        .eq("id", id)
        .abortSignal(signal),
    );
  }

  async recordSentReminder(
    id: number,
    kind: ReminderKind,
    timeOfDay: string,
    sentAtIso: string,
  ): Promise<SentReminderRecord> {
    const data = await this.request(`recordSentReminder(${id})`, (signal) =>
      this.client
        .from("sent_reminders")
        .insert({
          id: `rem_${nanoid(12)}`,
          user_id: id,
          kind,
          time_of_day: timeOfDay,
          sent_at: sentAtIso,
        })
        .select()
        .abortSignal(signal)
        .single(),
    );
    return sentReminderRowSchema.parse(data);
  }

  async sentRemindersToday(id: number, dayStartIso: string): Promise<SentReminderRecord[]> {
    const data = await this.request(`sentRemindersToday(${id})`, (signal) =>
      this.client
        .from("sent_reminders")
        .select("*")
        .eq("user_id", id)
        .gte("sent_at", dayStartIso)
        .abortSignal(signal),
    );
    return z.array(sentReminderRowSchema).parse(data ?? []);
  }

  async getTemplates(type: TemplateType, thresholdDays?: ThresholdDays): Promise<MessageTemplate[]> {
    const data = await this.request(`getTemplates(${type})`, (signal) => {
      let query = this.client.from("message_templates").select("*").eq("template_type", type);
      if (thresholdDays !== undefined) {
        query = query.eq("threshold_days", thresholdDays);
      }
      return query.abortSignal(signal);
    });
    return z.array(templateRowSchema).parse(data ?? []);
  }

  async getDailyReminderTexts(): Promise<DailyReminderText[]> {
    const data = await this.request("getDailyReminderTexts", (signal) =>
      this.client.from("daily_reminder_messages").select("*").abortSignal(signal),
    );
    return z.array(dailyReminderRowSchema).parse(data ?? []);
  }
}
