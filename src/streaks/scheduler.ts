import type { DateTime } from "luxon";
import type { Subject } from "./schema";
import type { StreakStore } from "./store";
import type { StreakEngine } from "./engine";
import type { MessageSelector } from "./messages";
import { runWithConcurrency, type KeyedLock } from "./lock";
import { findDueSlot } from "./reminders";
import { formatTimeOnly, toUtcIso } from "./time";
import { describeError } from "../errors";

/**
 * Interface for sending notifications.
 * Abstracts away Telegram-specific details.
 */
export interface NotificationDispatcher {
  sendMessage(chatId: number, text: string): Promise<void>;
}

/**
 * Runs `handler` every `intervalMs`, aligned to the interval boundary.
 * The next run is only scheduled once the current one has finished.
 */
export class PeriodicTask {
  private handle: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = true;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly handler: () => Promise<unknown>,
  ) {}

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.scheduleNext();
    console.log(`[Scheduler] ${this.name} started (every ${Math.round(this.intervalMs / 1000)}s)`);
  }

  /**
   * Stops scheduling and waits for an in-flight run to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    console.log(`[Scheduler] ${this.name} stopped`);
  }

  private scheduleNext(): void {
    if (this.stopped) return;
    const delayMs = this.intervalMs - (Date.now() % this.intervalMs);
    this.handle = setTimeout(() => this.fire(), delayMs);
  }

  private fire(): void {
    this.handle = null;
    this.inFlight = this.handler()
      .then(
        () => undefined,
        (e: unknown) => {
          console.error(`[Scheduler] ${this.name} failed: ${describeError(e)}`);
        },
      )
      .finally(() => {
        this.inFlight = null;
        this.scheduleNext();
      });
  }
}

export type TickSummary = {
  evaluated: number;
  sent: number;
  failed: number;
};

export type SchedulerOptions = {
  reminderTickMs: number;
  endOfDayTickMs: number;
  /** first local hour (inclusive) of the end-of-day window */
  endOfDayStartHour: number;
  /** last local hour (exclusive) of the end-of-day window */
  endOfDayEndHour: number;
  concurrency: number;
};

export type SchedulerDeps = {
  store: StreakStore;
  engine: StreakEngine;
  selector: MessageSelector;
  dispatcher: NotificationDispatcher;
  lock: KeyedLock;
  options: SchedulerOptions;
};

/**
 * Sends daily reminders at each subject's configured local times, and one
 * end-of-day notice to subjects who have not read yet.
 */
export class ReminderScheduler {
  private readonly reminderTask: PeriodicTask;
  private readonly endOfDayTask: PeriodicTask;

  constructor(private readonly deps: SchedulerDeps) {
    this.reminderTask = new PeriodicTask("reminder tick", deps.options.reminderTickMs, () =>
      this.runReminderTick(),
    );
    this.endOfDayTask = new PeriodicTask("end-of-day tick", deps.options.endOfDayTickMs, () =>
      this.runEndOfDayTick(),
    );
  }

  start(): void {
    this.reminderTask.start();
    this.endOfDayTask.start();
  }

  async stop(): Promise<void> {
    await Promise.all([this.reminderTask.stop(), this.endOfDayTask.stop()]);
  }

  private localTime(subject: Subject, now?: DateTime): DateTime {
    const zone = this.deps.engine.zoneOf(subject);
    return now ? now.setZone(zone) : this.deps.engine.localNow(subject);
  }

  /**
   * Evaluates every subject with reminder times and sends the due reminders.
   */
  async runReminderTick(now?: DateTime): Promise<TickSummary> {
    const subjects = await this.deps.store.listSubjectsWithReminders();
    const results = await runWithConcurrency(subjects, this.deps.options.concurrency, (subject) =>
      this.remindSubject(subject, now),
    );
    const summary = summarize(subjects, results, "reminder");
    if (summary.sent > 0 || summary.failed > 0) {
      console.log(
        `[Scheduler] Reminder tick: evaluated ${summary.evaluated}, ` +
          `sent ${summary.sent}, failed ${summary.failed}`,
      );
    }
    return summary;
  }

  private async remindSubject(subject: Subject, now?: DateTime): Promise<boolean> {
    const { store, selector, dispatcher, lock } = this.deps;
    const nowLocal = this.localTime(subject, now);

    return lock.run(subject.id, async () => {
      const slot = await findDueSlot(subject, nowLocal, this.deps);
      if (!slot) return false;

      const current = (await store.getSubject(subject.id)) ?? subject;
      const text = await selector.reminderMessage(current, current.language);
      await dispatcher.sendMessage(subject.id, text);
      await store.recordSentReminder(subject.id, "daily", slot, toUtcIso(nowLocal));
      console.log(`[Scheduler] Sent ${slot} reminder to ${subject.id}`);
      return true;
    });
  }

  /**
   * Refreshes the counters of subjects in their end-of-day window who have
   * not completed today, and sends each of them at most one notice per day.
   */
  async runEndOfDayTick(now?: DateTime): Promise<TickSummary> {
    const subjects = await this.deps.store.listSubjects();
    const results = await runWithConcurrency(subjects, this.deps.options.concurrency, (subject) =>
      this.notifyEndOfDay(subject, now),
    );
    const summary = summarize(subjects, results, "end-of-day notice");
    console.log(
      `[Scheduler] End-of-day tick: evaluated ${summary.evaluated}, ` +
        `sent ${summary.sent}, failed ${summary.failed}`,
    );
    return summary;
  }

  private async notifyEndOfDay(subject: Subject, now?: DateTime): Promise<boolean> {
    const { store, engine, selector, dispatcher, lock, options } = this.deps;
    const nowLocal = this.localTime(subject, now);

    if (nowLocal.hour < options.endOfDayStartHour || nowLocal.hour >= options.endOfDayEndHour) {
      return false;
    }
    if (await engine.hasCompletedOnLocalDay(subject.id, nowLocal)) {
      return false;
    }

    const outcome = await engine.advance(subject.id, false, { now: nowLocal });

    return lock.run(subject.id, async () => {
      const sent = await store.sentRemindersToday(subject.id, toUtcIso(nowLocal.startOf("day")));
      if (sent.some((r) => r.kind === "endOfDay")) {
        return false;
      }

      const text = await selector.endOfDayMessage(outcome, outcome.subject.language);
      if (!text) return false;

      await dispatcher.sendMessage(subject.id, text);
      await store.recordSentReminder(
        subject.id,
        "endOfDay",
        formatTimeOnly(nowLocal),
        toUtcIso(nowLocal),
      );
      console.log(`[Scheduler] Sent end-of-day notice to ${subject.id}`);
      return true;
    });
  }
}

function summarize(
  subjects: readonly Subject[],
  results: readonly PromiseSettledResult<boolean>[],
  label: string,
): TickSummary {
  const summary: TickSummary = { evaluated: subjects.length, sent: 0, failed: 0 };
  results.forEach((result, index) => {
    if (result.status === "fulfilled") {
      if (result.value) summary.sent++;
      return;
    }
    summary.failed++;
    console.error(
      `[Scheduler] Failed to send ${label} to ${subjects[index].id}: ${describeError(result.reason)}`,
    );
  });
  return summary;
}
