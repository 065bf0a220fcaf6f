import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MessageSelector, streakHeader, threshold } from "./messages";
import type { DailyReminderText, MessageTemplate } from "./schema";
import { MemoryStore } from "./store";

function template(overrides: Partial<MessageTemplate> & Pick<MessageTemplate, "id">): MessageTemplate {
  return {
    templateType: "reward",
    thresholdDays: 1,
    textEn: "",
    textAr: "",
    messageEn: "",
    messageAr: "",
    ...overrides,
  };
}

const rewardOne = template({ id: "r1", textEn: "Nice start", messageEn: "Keep going" });
const rewardWeek = template({ id: "r7", thresholdDays: 7, textEn: "One week" });
const warningThree = template({
  id: "w3",
  templateType: "warning",
  thresholdDays: 3,
  textEn: "Come back",
  textAr: "عد إلينا",
  messageEn: "We miss you",
});

function selectorWith(
  templates: MessageTemplate[],
  dailyReminders: DailyReminderText[] = [],
  random = () => 0,
) {
  const store = new MemoryStore({ timezone: "UTC", language: "en" }, { templates, dailyReminders });
  return new MessageSelector(store, random);
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("threshold", () => {
  it.each([
    [2, true, 1],
    [6, true, 1],
    [30, true, 30],
    [0, true, 1],
    [10, false, 7],
    [2, false, 1],
    [4, false, 3],
    [5, false, 5],
    [45, false, 30],
  ] as const)("threshold(%i, reward=%s) is %i", (days, isReward, expected) => {
    expect(threshold(days, isReward)).toBe(expected);
  });

  it("never decreases as days grow", () => {
    for (const isReward of [true, false]) {
      let previous = 0;
      for (let days = 0; days <= 60; days++) {
        const bucket = threshold(days, isReward);
        expect(bucket).toBeGreaterThanOrEqual(previous);
        previous = bucket;
      }
    }
  });
});

describe("MessageSelector.pickTemplate", () => {
  it("prefers a template at the exact bucket", async () => {
    const selector = selectorWith([rewardWeek, rewardOne]);
    expect((await selector.pickTemplate("reward", 3))?.id).toBe("r1");
  });

  it("falls back to any template of the type", async () => {
    const selector = selectorWith([rewardOne, warningThree]);
    expect((await selector.pickTemplate("warning", 40))?.id).toBe("w3");
  });

  it("returns null when the type has no templates", async () => {
    const selector = selectorWith([rewardOne]);
    expect(await selector.pickTemplate("warning", 1)).toBeNull();
  });

  it("picks among exact matches with the random source", async () => {
    const second = template({ id: "r1-b", textEn: "Second" });
    expect((await selectorWith([rewardOne, second], [], () => 0).pickTemplate("reward", 1))?.id).toBe(
      "r1",
    );
    expect(
      (await selectorWith([rewardOne, second], [], () => 0.99).pickTemplate("reward", 1))?.id,
    ).toBe("r1-b");
  });
});

describe("MessageSelector compositions", () => {
  it("builds a reward message with a streak header", async () => {
    const selector = selectorWith([rewardOne]);
    expect(await selector.streakMessage({ currentStreak: 1, reverseStreak: 0 }, "en")).toBe(
      "🔥 Your current streak: 1 days\n\nNice start\n\nKeep going",
    );
  });

  it("fills an empty reward message with the default one", async () => {
    const selector = selectorWith([rewardWeek]);
    expect(
      await selector.streakMessage({ currentStreak: 8, reverseStreak: 0 }, "en", false),
    ).toBe("One week\n\nKeep up your daily Quran reading streak! Every day brings you closer to Allah.");
  });

  it("builds an inactivity message from a warning template", async () => {
    const selector = selectorWith([warningThree]);
    expect(await selector.streakMessage({ currentStreak: 0, reverseStreak: 3 }, "en")).toBe(
      "⚠️ Days of inactivity: 3 days\n\nCome back\n\nWe miss you",
    );
  });

  it("uses the built-in fallback without templates", async () => {
    const selector = selectorWith([]);
    expect(
      await selector.streakMessage({ currentStreak: 0, reverseStreak: 2 }, "en", false),
    ).toBe(
      "Don't worry! It's been 2 days since your last check-in. You can start again today! 📖",
    );
    expect(await selector.streakMessage({ currentStreak: 12, reverseStreak: 0 }, "en", false)).toBe(
      "Amazing! You've maintained your Quran reading streak for 12 days! 🎉",
    );
  });

  it("welcomes a subject with no history", async () => {
    const selector = selectorWith([]);
    expect(await selector.streakMessage({ currentStreak: 0, reverseStreak: 0 }, "en")).toBe(
      "📚 Start your reading streak today!\n\n" +
        "Ready to start your Quran reading journey? Send a checkmark when you're done! 📚",
    );
  });

  it("composes the completion reply", async () => {
    const selector = selectorWith([rewardOne]);
    expect(await selector.completionMessage({ currentStreak: 2, reverseStreak: 0 }, "en")).toBe(
      "✅ You've completed your daily portion!\n\n" +
        "🔥 Your current streak: 2 days\n\n" +
        "Nice start\n\nKeep going",
    );
  });

  it("composes a reminder from the daily texts", async () => {
    const selector = selectorWith(
      [],
      [{ id: "d1", textEn: "Read today", textAr: "اقرأ اليوم" }],
    );
    expect(await selector.reminderMessage({ currentStreak: 3, reverseStreak: 0 }, "ar")).toBe(
      "⏰ تذكير قراءة القرآن\n\n🔥 لديك سلسلة قراءة مستمرة منذ 3 أيام\n\nاقرأ اليوم",
    );
  });

  it("falls back to the built-in reminder text", async () => {
    const selector = selectorWith([]);
    expect(await selector.reminderMessage({ currentStreak: 0, reverseStreak: 0 }, "en")).toBe(
      "⏰ Quran Reading Reminder\n\n📚 Start your reading streak today!\n\n" +
        "It's time for your daily Quran reading! Keep up your streak! 📖",
    );
  });
});

describe("MessageSelector.endOfDayMessage", () => {
  it("stays silent without a streak or a gap", async () => {
    const selector = selectorWith([warningThree]);
    expect(await selector.endOfDayMessage({ currentStreak: 0, reverseStreak: 0 }, "en")).toBeNull();
  });

  it("warns about a streak at risk", async () => {
    const selector = selectorWith([]);
    expect(await selector.endOfDayMessage({ currentStreak: 5, reverseStreak: 0 }, "en")).toBe(
      "⚠️ Streak Break Alert\n\n" +
        "You haven't read the Quran today! Your 5-day streak will break at midnight.\n\n" +
        "You still have time to read and send a checkmark to maintain your streak! 📖",
    );
  });

  it("sends an inactivity notice from a warning template", async () => {
    const selector = selectorWith([warningThree]);
    expect(await selector.endOfDayMessage({ currentStreak: 0, reverseStreak: 3 }, "en")).toBe(
      "📖 Daily Reading Reminder\n\nCome back\n\nWe miss you",
    );
  });
});

describe("streakHeader", () => {
  it("speaks the subject's language", () => {
    expect(streakHeader({ currentStreak: 0, reverseStreak: 4 }, "ar")).toBe("⚠️ أيام الانقطاع: 4 أيام");
  });
});
