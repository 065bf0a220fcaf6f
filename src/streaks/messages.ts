import type {
  Language,
  MessageTemplate,
  StreakCounts,
  TemplateType,
  ThresholdDays,
} from "./schema";
import type { StreakStore } from "./store";
import { t } from "./locales";

/**
 * Maps a day count to its message bucket.
 * Reward buckets: 1, 7, 30. Warning buckets: 1, 3, 5, 7, 30.
 */
export function threshold(days: number, isReward: boolean): ThresholdDays {
  if (days >= 30) return 30;
  if (days >= 7) return 7;
  if (isReward) return 1;
  if (days >= 5) return 5;
  if (days >= 3) return 3;
  return 1;
}

function pick<T>(items: readonly T[], random: () => number): T | null {
  if (items.length === 0) return null;
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

function templateText(template: MessageTemplate, language: Language): string {
  return language === "ar" ? template.textAr : template.textEn;
}

function templateMessage(template: MessageTemplate, language: Language): string {
  return language === "ar" ? template.messageAr : template.messageEn;
}

/**
 * Header line describing the subject's streak state.
 */
export function streakHeader(counts: StreakCounts, language: Language): string {
  const s = t(language);
  if (counts.currentStreak > 0) return s.streakHeader(counts.currentStreak);
  if (counts.reverseStreak > 0) return s.inactivityHeader(counts.reverseStreak);
  return s.startHeader;
}

/**
 * Picks templated copy by streak bucket and composes the bot's messages.
 */
export class MessageSelector {
  constructor(
    private readonly store: StreakStore,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * A random template at the exact bucket, else any template of the type,
   * else null.
   */
  async pickTemplate(type: TemplateType, days: number): Promise<MessageTemplate | null> {
    const bucket = threshold(days, type === "reward");
    const exact = pick(await this.store.getTemplates(type, bucket), this.random);
    if (exact) return exact;

    console.warn(`[Messages] No ${type} template for ${bucket} days, trying any threshold`);
    const any = pick(await this.store.getTemplates(type), this.random);
    if (!any) {
      console.warn(`[Messages] No ${type} templates available`);
    }
    return any;
  }

  /**
   * Streak status body: reward copy for a running streak, warning copy for
   * inactivity, a welcome otherwise.
   */
  async streakMessage(
    counts: StreakCounts,
    language: Language,
    includeHeader = true,
  ): Promise<string> {
    const s = t(language);
    const header = includeHeader ? `${streakHeader(counts, language)}\n\n` : "";

    if (counts.currentStreak > 0) {
      const template = await this.pickTemplate("reward", counts.currentStreak);
      if (!template) {
        return `${header}${s.rewardFallback(counts.currentStreak)}`;
      }
      const message = templateMessage(template, language) || s.rewardDefaultMessage;
      return `${header}${joinParts(templateText(template, language), message)}`;
    }

    if (counts.reverseStreak > 0) {
      const template = await this.pickTemplate("warning", counts.reverseStreak);
      const body = template
        ? joinParts(
            templateText(template, language),
            templateMessage(template, language) ||
              s.warningDefaultMessage(counts.reverseStreak),
          )
        : "";
      return `${header}${body || s.warningFallback(counts.reverseStreak)}`;
    }

    return `${header}${s.welcome}`;
  }

  /**
   * Reply to a fresh completion.
   */
  async completionMessage(counts: StreakCounts, language: Language): Promise<string> {
    const body = await this.streakMessage(counts, language, false);
    return [t(language).completed, streakHeader(counts, language), body].join("\n\n");
  }

  alreadyCompletedMessage(language: Language): string {
    return t(language).alreadyCompleted;
  }

  /**
   * Scheduled daily reminder: title, streak header and a random reminder text.
   */
  async reminderMessage(counts: StreakCounts, language: Language): Promise<string> {
    const s = t(language);
    const reminder = pick(await this.store.getDailyReminderTexts(), this.random);
    const text = reminder
      ? (language === "ar" ? reminder.textAr : reminder.textEn) || s.reminderFallback
      : s.reminderFallback;
    return [s.reminderTitle, streakHeader(counts, language), text].join("\n\n");
  }

  /**
   * End-of-day notice for a subject who has not completed today.
   * Returns null when there is neither a streak to lose nor a gap to mention.
   */
  async endOfDayMessage(counts: StreakCounts, language: Language): Promise<string | null> {
    const s = t(language);
    const { currentStreak, reverseStreak } = counts;
    if (currentStreak <= 0 && reverseStreak <= 0) {
      return null;
    }

    const template = await this.pickTemplate("warning", reverseStreak > 0 ? reverseStreak : 1);
    if (!template) {
      return currentStreak > 0
        ? `${s.endOfDayStreakTitle}\n\n${s.endOfDayStreakFallback(currentStreak)}`
        : `${s.endOfDayInactiveTitle}\n\n${s.endOfDayInactiveFallback(reverseStreak)}`;
    }

    const title = currentStreak > 0 ? s.endOfDayStreakTitle : s.endOfDayInactiveTitle;
    const parts = [
      title,
      templateText(template, language) || s.endOfDayDefaultText,
      templateMessage(template, language),
    ];
    if (currentStreak > 0) {
      parts.push(s.endOfDayStreakCall(currentStreak));
    }
    return joinParts(...parts);
  }
}

function joinParts(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join("\n\n");
}
