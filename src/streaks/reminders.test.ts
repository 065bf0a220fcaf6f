import { beforeEach, describe, expect, it, vi } from "vitest";
import { DateTime } from "luxon";
import { StreakEngine } from "./engine";
import { KeyedLock } from "./lock";
import {
  addReminderTime,
  isDue,
  listReminderTimes,
  matchingSlot,
  removeReminderTime,
} from "./reminders";
import { MemoryStore } from "./store";
import { fixedClock } from "./time";
import { ValidationError } from "../errors";

function local(iso: string, zone = "UTC") {
  return DateTime.fromISO(iso, { zone });
}

async function setup(times: string[], zone = "UTC") {
  const store = new MemoryStore({ timezone: zone, language: "en" });
  const lock = new KeyedLock();
  const clock = fixedClock("2024-03-04T08:00:00Z");
  const engine = new StreakEngine(store, { clock, lock, defaultTimezone: "UTC" });
  await store.createSubject(1, "reader");
  await store.setReminderTimes(1, times);
  const subject = await store.getSubject(1);
  if (!subject) throw new Error("subject missing");
  return { store, lock, engine, clock, subject };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("matchingSlot", () => {
  it("matches to the minute only", () => {
    expect(matchingSlot(["08:00", "21:30"], local("2024-03-04T08:00:00"))).toBe("08:00");
    expect(matchingSlot(["08:00"], local("2024-03-04T08:01:00"))).toBeNull();
    expect(matchingSlot(["08:00"], local("2024-03-04T07:59:59"))).toBeNull();
  });

  it("accepts unpadded stored times", () => {
    expect(matchingSlot(["8:00"], local("2024-03-04T08:00:30"))).toBe("08:00");
  });
});

describe("isDue", () => {
  it("is due at an exact configured time", async () => {
    const deps = await setup(["08:00"]);
    expect(await isDue(deps.subject, local("2024-03-04T08:00:00"), deps)).toBe(true);
  });

  it("is not due one minute off", async () => {
    const deps = await setup(["08:00"]);
    expect(await isDue(deps.subject, local("2024-03-04T08:01:00"), deps)).toBe(false);
  });

  it("is not due once a reminder for the slot was sent today", async () => {
    const deps = await setup(["08:00"]);
    await deps.store.recordSentReminder(1, "daily", "08:00", "2024-03-04T08:00:10.000Z");

    expect(await isDue(deps.subject, local("2024-03-04T08:00:40"), deps)).toBe(false);
    expect(await isDue(deps.subject, local("2024-03-05T08:00:00"), deps)).toBe(true);
  });

  it("ignores an end-of-day record for the same time", async () => {
    const deps = await setup(["21:00"]);
    await deps.store.recordSentReminder(1, "endOfDay", "21:00", "2024-03-04T21:00:00.000Z");
    expect(await isDue(deps.subject, local("2024-03-04T21:00:00"), deps)).toBe(true);
  });

  it("is not due after a completion", async () => {
    const deps = await setup(["20:00"]);
    await deps.engine.advance(1, true, { now: local("2024-03-04T07:30:00") });
    expect(await isDue(deps.subject, local("2024-03-04T20:00:00"), deps)).toBe(false);
  });

  it("uses the subject's local day for sent records", async () => {
    const deps = await setup(["06:00"], "Asia/Tokyo");
    // 06:00 Tokyo on the 5th is 21:00 UTC on the 4th
    await deps.store.recordSentReminder(1, "daily", "06:00", "2024-03-04T21:00:00.000Z");

    expect(
      await isDue(deps.subject, local("2024-03-05T06:00:00", "Asia/Tokyo"), deps),
    ).toBe(false);
    expect(
      await isDue(deps.subject, local("2024-03-06T06:00:00", "Asia/Tokyo"), deps),
    ).toBe(true);
  });
});

describe("reminder time management", () => {
  it("adds, normalises and de-duplicates times", async () => {
    const { store, lock } = await setup([]);

    expect(await addReminderTime(store, lock, 1, "21:30")).toBe(true);
    expect(await addReminderTime(store, lock, 1, "5:30")).toBe(true);
    expect(await addReminderTime(store, lock, 1, "05:30")).toBe(false);

    expect(await listReminderTimes(store, 1)).toEqual(["05:30", "21:30"]);
  });

  it("rejects malformed times", async () => {
    const { store, lock } = await setup([]);
    await expect(addReminderTime(store, lock, 1, "25:00")).rejects.toBeInstanceOf(ValidationError);
    await expect(removeReminderTime(store, lock, 1, "noon")).rejects.toBeInstanceOf(ValidationError);
  });

  it("removes a configured time", async () => {
    const { store, lock } = await setup(["08:00", "20:00"]);

    expect(await removeReminderTime(store, lock, 1, "8:00")).toBe(true);
    expect(await removeReminderTime(store, lock, 1, "8:00")).toBe(false);
    expect(await listReminderTimes(store, 1)).toEqual(["20:00"]);
  });
});
