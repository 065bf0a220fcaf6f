import { DateTime, Duration } from "luxon";
import type { StreakCounts, StreakState, Subject } from "./schema";
import type { StreakStore } from "./store";
import type { KeyedLock } from "./lock";
import {
  calendarDaysBetween,
  parseInstant,
  resolveZone,
  toUtcIso,
  type Clock,
} from "./time";

/**
 * Window of the duplicate-completion guard.
 */
export const COMPLETION_WINDOW = { hours: 24 } as const;

const COMPLETION_WINDOW_MS = Duration.fromObject(COMPLETION_WINDOW).toMillis();

export type AdvanceStatus =
  /** a new completion was recorded */
  | "completed"
  /** a completion was already recorded within the window; nothing changed */
  | "alreadyCompleted"
  /** a non-completion call; counters re-evaluated against the clock */
  | "refreshed";

export type AdvanceOutcome = StreakCounts & {
  status: AdvanceStatus;
  subject: Subject;
};

/**
 * True when the run since the last check-in is over: more than 24 hours
 * have passed and at least one whole local day was skipped.
 */
export function isRunBroken(lastCheckIn: DateTime, now: DateTime): boolean {
  const elapsedMs = now.toMillis() - lastCheckIn.toMillis();
  return elapsedMs > COMPLETION_WINDOW_MS && calendarDaysBetween(lastCheckIn, now) >= 2;
}

/**
 * Computes the next (current, reverse) pair.
 *
 * @param state counters and last check-in before this event
 * @param hadCompletion whether this event is a completion
 * @param now the event instant, in the subject's zone
 * @param completedToday whether a completion is already recorded on the local day of `now`
 */
export function computeAdvance(
  state: StreakState,
  hadCompletion: boolean,
  now: DateTime,
  completedToday = false,
): StreakCounts {
  if (!state.lastCheckInIso) {
    return hadCompletion
      ? { currentStreak: 1, reverseStreak: 0 }
      : { currentStreak: 0, reverseStreak: 1 };
  }

  const lastCheckIn = parseInstant(state.lastCheckInIso).setZone(now.zone);

  if (isRunBroken(lastCheckIn, now)) {
    if (hadCompletion) {
      return { currentStreak: 1, reverseStreak: 0 };
    }
    return {
      currentStreak: 0,
      reverseStreak: Math.floor(now.diff(lastCheckIn, "days").days),
    };
  }

  if (!hadCompletion) {
    return { currentStreak: state.currentStreak, reverseStreak: state.reverseStreak };
  }

  const laterDay = now.startOf("day").toMillis() > lastCheckIn.startOf("day").toMillis();
  return {
    currentStreak:
      !completedToday || laterDay ? state.currentStreak + 1 : state.currentStreak,
    reverseStreak: 0,
  };
}

export type StreakEngineOptions = {
  clock: Clock;
  lock: KeyedLock;
  defaultTimezone: string;
};

/**
 * Owns the streak counters. Every mutation of one subject runs under that
 * subject's lock, and a failed commit leaves the stored counters as they were.
 */
export class StreakEngine {
  constructor(
    private readonly store: StreakStore,
    private readonly options: StreakEngineOptions,
  ) {}

  /**
   * Fetches a subject, creating it with zero state if missing.
   */
  async getOrCreateSubject(subjectId: number, username?: string): Promise<Subject> {
    const existing = await this.store.getSubject(subjectId);
    if (existing) return existing;
    console.log(`[Engine] Creating subject ${subjectId}`);
    return this.store.createSubject(subjectId, username);
  }

  /**
   * The subject's zone, falling back to the default for unknown zones.
   */
  zoneOf(subject: Pick<Subject, "timezone">): string {
    return resolveZone(subject.timezone, this.options.defaultTimezone);
  }

  localNow(subject: Pick<Subject, "timezone">): DateTime {
    return this.options.clock.now(this.zoneOf(subject));
  }

  /**
   * Rolling-window guard: was a completion recorded less than 24 hours ago?
   */
  async hasCompletedWithinWindow(subjectId: number, now: DateTime): Promise<boolean> {
    const since = toUtcIso(now.minus(COMPLETION_WINDOW));
    const events = await this.store.checkInsSince(subjectId, since);
    const nowMs = now.toMillis();
    return events.some((e) => {
      const elapsedMs = nowMs - parseInstant(e.atIso).toMillis();
      return e.completed && elapsedMs >= 0 && elapsedMs < COMPLETION_WINDOW_MS;
    });
  }

  /**
   * Calendar-day check: was a completion recorded on the local day of `now`?
   */
  async hasCompletedOnLocalDay(subjectId: number, now: DateTime): Promise<boolean> {
    const since = toUtcIso(now.startOf("day"));
    const events = await this.store.checkInsSince(subjectId, since);
    const nowMs = now.toMillis();
    return events.some((e) => e.completed && parseInstant(e.atIso).toMillis() <= nowMs);
  }

  /**
   * Applies a completion (or a plain re-evaluation) to a subject's streaks.
   * A completion within 24 hours of a previous one is reported as
   * `alreadyCompleted` and changes nothing.
   */
  async advance(
    subjectId: number,
    hadCompletion: boolean,
    options: { now?: DateTime; username?: string } = {},
  ): Promise<AdvanceOutcome> {
    return this.options.lock.run<AdvanceOutcome>(subjectId, async () => {
      const subject = await this.getOrCreateSubject(subjectId, options.username);
      const zone = this.zoneOf(subject);
      const now = (options.now ?? this.options.clock.now(zone)).setZone(zone);

      if (hadCompletion && (await this.hasCompletedWithinWindow(subjectId, now))) {
        console.log(`[Engine] Subject ${subjectId} already completed within the last 24h`);
        return {
          status: "alreadyCompleted",
          currentStreak: subject.currentStreak,
          reverseStreak: subject.reverseStreak,
          subject,
        };
      }

      const completedToday = hadCompletion
        ? await this.hasCompletedOnLocalDay(subjectId, now)
        : false;
      const counts = computeAdvance(subject, hadCompletion, now, completedToday);
      const next: StreakState = {
        ...counts,
        lastCheckInIso: hadCompletion ? toUtcIso(now) : subject.lastCheckInIso,
      };

      const changed =
        next.currentStreak !== subject.currentStreak ||
        next.reverseStreak !== subject.reverseStreak ||
        next.lastCheckInIso !== subject.lastCheckInIso;

      if (changed) {
        await this.commit(subject, next, hadCompletion ? now : null);
      }

      if (hadCompletion) {
        console.log(
          `[Engine] Subject ${subjectId} completed: streak=${next.currentStreak}`,
        );
      }

      return {
        status: hadCompletion ? "completed" : "refreshed",
        ...counts,
        subject: { ...subject, ...next },
      };
    });
  }

  /**
   * Writes the counters, then the check-in event. If the event cannot be
   * written the previous counters are restored before the error propagates.
   */
  private async commit(
    subject: Subject,
    next: StreakState,
    completedAt: DateTime | null,
  ): Promise<void> {
    await this.store.updateStreak(subject.id, next);
    if (!completedAt) return;

    try {
      await this.store.appendCheckIn(subject.id, toUtcIso(completedAt), true);
    } catch (e) {
      console.error(
        `[Engine] Failed to record check-in for ${subject.id}, restoring counters`,
      );
      await this.store.updateStreak(subject.id, {
        currentStreak: subject.currentStreak,
        reverseStreak: subject.reverseStreak,
        lastCheckInIso: subject.lastCheckInIso,
      });
      throw e;
    }
  }
}
