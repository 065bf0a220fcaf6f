import fs from "fs";
import path from "path";
import { nanoid } from "nanoid";
import {
  CURRENT_STORE_VERSION,
  seedFileSchema,
  storeFileSchema,
  type CheckInEvent,
  type DailyReminderText,
  type Language,
  type MessageTemplate,
  type ReminderKind,
  type SeedFile,
  type SentReminderRecord,
  type StoreFile,
  type StreakState,
  type Subject,
  type TemplateType,
  type ThresholdDays,
} from "./schema";
import { parseInstant } from "./time";
import { TransientStoreError, describeError } from "../errors";

export type ProfileUpdate = Partial<Pick<Subject, "username" | "timezone" | "language">>;

/**
 * Record store behind the streak engine and the reminder scheduler.
 * Instants cross this boundary as UTC ISO strings.
 */
export interface StreakStore {
  getSubject(id: number): Promise<Subject | null>;
  createSubject(id: number, username?: string): Promise<Subject>;
  updateStreak(id: number, state: StreakState): Promise<void>;
  updateProfile(id: number, update: ProfileUpdate): Promise<void>;
  listSubjects(): Promise<Subject[]>;
  listSubjectsWithReminders(): Promise<Subject[]>;

  /** Idempotent for the same subject, minute and completion flag. */
  appendCheckIn(id: number, atIso: string, completed: boolean): Promise<CheckInEvent>;
  checkInsSince(id: number, sinceIso: string): Promise<CheckInEvent[]>;

  getReminderTimes(id: number): Promise<string[]>;
  setReminderTimes(id: number, times: string[]): Promise<void>;
  recordSentReminder(
    id: number,
    kind: ReminderKind,
    timeOfDay: string,
    sentAtIso: string,
  ): Promise<SentReminderRecord>;
  /** Records sent at or after the start of the subject's local day. */
  sentRemindersToday(id: number, dayStartIso: string): Promise<SentReminderRecord[]>;

  /** All templates of a type, or only those at one threshold. */
  getTemplates(type: TemplateType, thresholdDays?: ThresholdDays): Promise<MessageTemplate[]>;
  getDailyReminderTexts(): Promise<DailyReminderText[]>;
}

export type SubjectDefaults = {
  timezone: string;
  language: Language;
};

function emptyStoreFile(seed?: SeedFile): StoreFile {
  return {
    version: CURRENT_STORE_VERSION,
    subjects: [],
    checkIns: [],
    sentReminders: [],
    templates: seed?.templates ?? [],
    dailyReminders: seed?.dailyReminders ?? [],
  };
}

function sameMinute(a: string, b: string): boolean {
  return parseInstant(a).startOf("minute").toMillis() === parseInstant(b).startOf("minute").toMillis();
}

function isAtOrAfter(iso: string, sinceIso: string): boolean {
  return parseInstant(iso).toMillis() >= parseInstant(sinceIso).toMillis();
}

function findSubject(data: StoreFile, id: number): Subject | undefined {
  return data.subjects.find((s) => s.id === id);
}

function requireSubject(data: StoreFile, id: number): Subject {
  const subject = findSubject(data, id);
  if (!subject) {
    throw new Error(`Subject ${id} not found`);
  }
  return subject;
}

/**
 * In-process store. Also the base of the JSON file store.
 *
 * Mutations run one at a time on a copy of the data. The copy replaces the
 * current data only once `persist` has accepted it, so a failed save leaves
 * every read where it was.
 */
export class MemoryStore implements StreakStore {
  protected data: StoreFile;
  // Promise queue to serialize mutations
  private mutation: Promise<void> = Promise.resolve();

  constructor(
    protected readonly defaults: SubjectDefaults,
    initial?: Partial<StoreFile>,
  ) {
    this.data = { ...emptyStoreFile(), ...initial };
  }

  /**
   * Called with the next state after every mutation, before it becomes current.
   */
  protected async persist(_next: StoreFile): Promise<void> {}

  private mutate<T>(apply: (draft: StoreFile) => T): Promise<T> {
    const run = this.mutation.then(async () => {
      const draft = structuredClone(this.data);
      const result = apply(draft);
      await this.persist(draft);
      this.data = draft;
      return result;
    });
    this.mutation = run.then(
      () => undefined,
      (e: unknown) => {
        console.error(`[Store] Mutation discarded: ${describeError(e)}`);
      },
    );
    return run;
  }

  async getSubject(id: number): Promise<Subject | null> {
    const subject = findSubject(this.data, id);
    return subject ? structuredClone(subject) : null;
  }

  async createSubject(id: number, username = ""): Promise<Subject> {
    const existing = findSubject(this.data, id);
    if (existing) {
      return structuredClone(existing);
    }

    return this.mutate((draft) => {
      let subject = findSubject(draft, id);
      if (!subject) {
        subject = {
          id,
          username,
          timezone: this.defaults.timezone,
          language: this.defaults.language,
          currentStreak: 0,
          reverseStreak: 0,
          lastCheckInIso: null,
          reminderTimes: [],
          createdAtIso: new Date().toISOString(),
        };
        draft.subjects.push(subject);
      }
      return structuredClone(subject);
    });
  }

  async updateStreak(id: number, state: StreakState): Promise<void> {
    await this.mutate((draft) => {
      const subject = requireSubject(draft, id);
      subject.currentStreak = state.currentStreak;
      subject.reverseStreak = state.reverseStreak;
      subject.lastCheckInIso = state.lastCheckInIso;
    });
  }

  async updateProfile(id: number, update: ProfileUpdate): Promise<void> {
    await this.mutate((draft) => {
      Object.assign(requireSubject(draft, id), update);
    });
  }

  async listSubjects(): Promise<Subject[]> {
    return structuredClone(this.data.subjects);
  }

  async listSubjectsWithReminders(): Promise<Subject[]> {
    return structuredClone(this.data.subjects.filter((s) => s.reminderTimes.length > 0));
  }

  async appendCheckIn(id: number, atIso: string, completed: boolean): Promise<CheckInEvent> {
    const isDuplicate = (c: CheckInEvent) =>
      c.subjectId === id && c.completed === completed && sameMinute(c.atIso, atIso);

    const duplicate = this.data.checkIns.find(isDuplicate);
    if (duplicate) {
      return { ...duplicate };
    }

    return this.mutate((draft) => {
      const existing = draft.checkIns.find(isDuplicate);
      if (existing) {
        return { ...existing };
      }
      const event: CheckInEvent = {
        id: `chk_${nanoid(12)}`,
        subjectId: id,
        atIso,
        completed,
      };
      draft.checkIns.push(event);
      return { ...event };
    });
  }

  async checkInsSince(id: number, sinceIso: string): Promise<CheckInEvent[]> {
    return this.data.checkIns
      .filter((c) => c.subjectId === id && isAtOrAfter(c.atIso, sinceIso))
      .map((c) => ({ ...c }));
  }

  async getReminderTimes(id: number): Promise<string[]> {
    return [...(findSubject(this.data, id)?.reminderTimes ?? [])];
  }

  async setReminderTimes(id: number, times: string[]): Promise<void> {
    await this.mutate((draft) => {
      requireSubject(draft, id).reminderTimes = [...new Set(times)];
    });
  }

  async recordSentReminder(
    id: number,
    kind: ReminderKind,
    timeOfDay: string,
    sentAtIso: string,
  ): Promise<SentReminderRecord> {
    return this.mutate((draft) => {
      const record: SentReminderRecord = {
        id: `rem_${nanoid(12)}`,
        subjectId: id,
        kind,
        timeOfDay,
        sentAtIso,
      };
      draft.sentReminders.push(record);
      return { ...record };
    });
  }

  async sentRemindersToday(id: number, dayStartIso: string): Promise<SentReminderRecord[]> {
    return this.data.sentReminders
      .filter((r) => r.subjectId === id && isAtOrAfter(r.sentAtIso, dayStartIso))
      .map((r) => ({ ...r }));
  }

  async getTemplates(type: TemplateType, thresholdDays?: ThresholdDays): Promise<MessageTemplate[]> {
    return this.data.templates
      .filter(
        (t) =>
          t.templateType === type &&
          (thresholdDays === undefined || t.thresholdDays === thresholdDays),
      )
      .map((t) => ({ ...t }));
  }

  async getDailyReminderTexts(): Promise<DailyReminderText[]> {
    return this.data.dailyReminders.map((r) => ({ ...r }));
  }
}

/**
 * Loads the reference templates and reminder texts.
 */
export function loadSeedFile(seedPath: string): SeedFile {
  if (!fs.existsSync(seedPath)) {
    console.warn(`[Store] Seed file ${seedPath} not found, starting without templates`);
    return { templates: [], dailyReminders: [] };
  }
  const content = fs.readFileSync(seedPath, "utf8");
  return seedFileSchema.parse(JSON.parse(content));
}

/**
 * JSON file store. The whole file is rewritten after each mutation,
 * via a temp file and a rename.
 */
export class FileStore extends MemoryStore {
  private constructor(
    private readonly filePath: string,
    defaults: SubjectDefaults,
    data: StoreFile,
  ) {
    super(defaults, data);
  }

  /**
   * Opens the store file, creating it from the seed file if missing.
   */
  static open(filePath: string, seedPath: string, defaults: SubjectDefaults): FileStore {
    if (!fs.existsSync(filePath)) {
      const data = emptyStoreFile(loadSeedFile(seedPath));
      const store = new FileStore(filePath, defaults, data);
      store.writeFile(data);
      console.log(`[Store] Created ${filePath}`);
      return store;
    }

    const content = fs.readFileSync(filePath, "utf8");
    const parsed = storeFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Failed to load ${filePath}: ${parsed.error.message}`);
    }
    console.log(
      `[Store] Loaded ${filePath} (${parsed.data.subjects.length} subjects, ` +
        `${parsed.data.checkIns.length} check-ins)`,
    );
    return new FileStore(filePath, defaults, parsed.data);
  }

  protected override async persist(next: StoreFile): Promise<void> {
    try {
      this.writeFile(next);
    } catch (e) {
      throw new TransientStoreError(`Failed to save ${this.filePath}: ${describeError(e)}`, e);
    }
  }

  private writeFile(data: StoreFile): void {
    const content = JSON.stringify(data, null, 2);
    const tmpPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.tmp`,
    );
    fs.writeFileSync(tmpPath, content, "utf8");
    fs.renameSync(tmpPath, this.filePath);
  }
}
