import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DateTime } from "luxon";
import { StreakEngine } from "./engine";
import { KeyedLock } from "./lock";
import { MessageSelector } from "./messages";
import {
  PeriodicTask,
  ReminderScheduler,
  type NotificationDispatcher,
} from "./scheduler";
import { MemoryStore } from "./store";
import { fixedClock } from "./time";
import { DispatchError, TransientStoreError } from "../errors";

class RecordingDispatcher implements NotificationDispatcher {
  readonly sent: { chatId: number; text: string }[] = [];
  readonly failFor = new Set<number>();

  async sendMessage(chatId: number, text: string): Promise<void> {
    if (this.failFor.has(chatId)) {
      throw new DispatchError("Forbidden: bot was blocked by the user", chatId);
    }
    this.sent.push({ chatId, text });
  }
}

class UnreliableStore extends MemoryStore {
  readonly unreachable = new Set<number>();

  override async sentRemindersToday(id: number, dayStartIso: string) {
    if (this.unreachable.has(id)) {
      throw new TransientStoreError("sent_reminders timed out");
    }
    return super.sentRemindersToday(id, dayStartIso);
  }
}

function utc(iso: string) {
  return DateTime.fromISO(iso, { zone: "utc" });
}

function setup() {
  const store = new UnreliableStore(
    { timezone: "UTC", language: "en" },
    { dailyReminders: [{ id: "d1", textEn: "Read today", textAr: "اقرأ اليوم" }] },
  );
  const lock = new KeyedLock();
  const engine = new StreakEngine(store, {
    clock: fixedClock("2024-03-04T00:00:00Z"),
    lock,
    defaultTimezone: "UTC",
  });
  const dispatcher = new RecordingDispatcher();
  const scheduler = new ReminderScheduler({
    store,
    engine,
    selector: new MessageSelector(store, () => 0),
    dispatcher,
    lock,
    options: {
      reminderTickMs: 60_000,
      endOfDayTickMs: 3_600_000,
      endOfDayStartHour: 21,
      endOfDayEndHour: 22,
      concurrency: 2,
    },
  });
  return { store, engine, dispatcher, scheduler };
}

async function withReminders(store: MemoryStore, id: number, times: string[]) {
  await store.createSubject(id);
  await store.setReminderTimes(id, times);
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("ReminderScheduler.runReminderTick", () => {
  it("sends due reminders once per slot and day", async () => {
    const { store, dispatcher, scheduler } = setup();
    await withReminders(store, 1, ["08:00"]);
    await withReminders(store, 2, ["09:00"]);
    await withReminders(store, 3, ["08:00", "20:00"]);

    const summary = await scheduler.runReminderTick(utc("2024-03-04T08:00:00Z"));

    expect(summary).toEqual({ evaluated: 3, sent: 2, failed: 0 });
    expect(dispatcher.sent.map((m) => m.chatId).sort()).toEqual([1, 3]);
    expect(dispatcher.sent[0].text).toBe(
      "⏰ Quran Reading Reminder\n\n📚 Start your reading streak today!\n\nRead today",
    );
    expect(await store.sentRemindersToday(1, "2024-03-04T00:00:00Z")).toMatchObject([
      { kind: "daily", timeOfDay: "08:00", sentAtIso: "2024-03-04T08:00:00.000Z" },
    ]);

    const again = await scheduler.runReminderTick(utc("2024-03-04T08:00:30Z"));
    expect(again).toEqual({ evaluated: 3, sent: 0, failed: 0 });
  });

  it("skips subjects who already completed", async () => {
    const { store, engine, dispatcher, scheduler } = setup();
    await withReminders(store, 1, ["08:00"]);
    await engine.advance(1, true, { now: utc("2024-03-04T07:00:00Z") });

    const summary = await scheduler.runReminderTick(utc("2024-03-04T08:00:00Z"));

    expect(summary).toEqual({ evaluated: 1, sent: 0, failed: 0 });
    expect(dispatcher.sent).toEqual([]);
  });

  it("composes the reminder from the stored counters, not the tick's listing", async () => {
    const { store, dispatcher, scheduler } = setup();
    await withReminders(store, 1, ["08:00"]);
    const listing = await store.listSubjectsWithReminders();
    vi.spyOn(store, "listSubjectsWithReminders").mockResolvedValue(listing);
    await store.updateStreak(1, {
      currentStreak: 4,
      reverseStreak: 0,
      lastCheckInIso: "2024-03-03T06:00:00.000Z",
    });

    await scheduler.runReminderTick(utc("2024-03-04T08:00:00Z"));

    expect(dispatcher.sent).toEqual([
      {
        chatId: 1,
        text: "⏰ Quran Reading Reminder\n\n🔥 Your current streak: 4 days\n\nRead today",
      },
    ]);
  });

  it("isolates a dispatch failure and leaves the slot unrecorded", async () => {
    const { store, dispatcher, scheduler } = setup();
    await withReminders(store, 1, ["08:00"]);
    await withReminders(store, 2, ["08:00"]);
    dispatcher.failFor.add(1);

    const summary = await scheduler.runReminderTick(utc("2024-03-04T08:00:00Z"));

    expect(summary).toEqual({ evaluated: 2, sent: 1, failed: 1 });
    expect(dispatcher.sent.map((m) => m.chatId)).toEqual([2]);
    expect(await store.sentRemindersToday(1, "2024-03-04T00:00:00Z")).toEqual([]);

    dispatcher.failFor.clear();
    const retry = await scheduler.runReminderTick(utc("2024-03-04T08:00:40Z"));
    expect(retry).toEqual({ evaluated: 2, sent: 1, failed: 0 });
  });

  it("isolates a store failure for one subject", async () => {
    const { store, dispatcher, scheduler } = setup();
    await withReminders(store, 1, ["08:00"]);
    await withReminders(store, 2, ["08:00"]);
    store.unreachable.add(2);

    const summary = await scheduler.runReminderTick(utc("2024-03-04T08:00:00Z"));

    expect(summary).toEqual({ evaluated: 2, sent: 1, failed: 1 });
    expect(dispatcher.sent.map((m) => m.chatId)).toEqual([1]);
  });
});

describe("ReminderScheduler.runEndOfDayTick", () => {
  async function history() {
    const ctx = setup();
    const { store, engine } = ctx;
    await engine.advance(10, true, { now: utc("2024-03-03T12:00:00Z") }); // streak at risk
    await engine.advance(11, true, { now: utc("2024-03-04T10:00:00Z") }); // done today
    await engine.advance(12, true, { now: utc("2024-03-01T12:00:00Z") }); // idle for days
    await store.createSubject(13); // never checked in
    return ctx;
  }

  it("notifies subjects who have not read today", async () => {
    const { store, dispatcher, scheduler } = await history();

    const summary = await scheduler.runEndOfDayTick(utc("2024-03-04T21:15:00Z"));

    expect(summary).toEqual({ evaluated: 4, sent: 3, failed: 0 });
    const byChat = new Map(dispatcher.sent.map((m) => [m.chatId, m.text]));
    expect([...byChat.keys()].sort()).toEqual([10, 12, 13]);
    expect(byChat.get(10)).toBe(
      "⚠️ Streak Break Alert\n\n" +
        "You haven't read the Quran today! Your 1-day streak will break at midnight.\n\n" +
        "You still have time to read and send a checkmark to maintain your streak! 📖",
    );
    expect(byChat.get(12)).toBe(
      "📖 Daily Reading Reminder\n\n" +
        "It's been 3 days since your last Quran reading. Resume your journey today!",
    );
    expect(await store.getSubject(12)).toMatchObject({ currentStreak: 0, reverseStreak: 3 });
    expect(await store.sentRemindersToday(10, "2024-03-04T00:00:00Z")).toMatchObject([
      { kind: "endOfDay", timeOfDay: "21:15" },
    ]);
  });

  it("sends at most one notice per local day", async () => {
    const { dispatcher, scheduler } = await history();
    await scheduler.runEndOfDayTick(utc("2024-03-04T21:15:00Z"));

    const second = await scheduler.runEndOfDayTick(utc("2024-03-04T21:45:00Z"));

    expect(second).toEqual({ evaluated: 4, sent: 0, failed: 0 });
    expect(dispatcher.sent).toHaveLength(3);
  });

  it("does nothing outside the end-of-day window", async () => {
    const { dispatcher, scheduler } = await history();

    expect(await scheduler.runEndOfDayTick(utc("2024-03-04T20:15:00Z"))).toEqual({
      evaluated: 4,
      sent: 0,
      failed: 0,
    });
    expect(await scheduler.runEndOfDayTick(utc("2024-03-04T22:00:00Z"))).toEqual({
      evaluated: 4,
      sent: 0,
      failed: 0,
    });
    expect(dispatcher.sent).toEqual([]);
  });
});

describe("PeriodicTask", () => {
  it("fires on interval boundaries until stopped", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-04T08:00:30Z"));
    const handler = vi.fn(async () => {});
    const task = new PeriodicTask("test tick", 60_000, handler);

    task.start();
    await vi.advanceTimersByTimeAsync(29_999);
    expect(handler).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(handler).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(handler).toHaveBeenCalledTimes(2);

    await task.stop();
    await vi.advanceTimersByTimeAsync(180_000);
    expect(handler).toHaveBeenCalledTimes(2);
    expect(task.running).toBe(false);
  });

  it("keeps going after a failed run", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-04T08:00:00Z"));
    const handler = vi.fn(async () => {
      throw new Error("tick exploded");
    });
    const task = new PeriodicTask("test tick", 1_000, handler);

    task.start();
    await vi.advanceTimersByTimeAsync(3_000);
    await task.stop();

    expect(handler).toHaveBeenCalledTimes(3);
    expect(console.error).toHaveBeenCalledWith(
      "[Scheduler] test tick failed: Error: tick exploded",
    );
  });

  it("waits for the in-flight run on stop", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-04T08:00:00Z"));
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const task = new PeriodicTask("slow tick", 1_000, () => gate);

    task.start();
    await vi.advanceTimersByTimeAsync(1_000);

    let stopped = false;
    const stopping = task.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(stopped).toBe(true);
  });
});
