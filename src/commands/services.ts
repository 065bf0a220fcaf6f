import type { User } from "telegraf/types";
import type { VerseExplainer } from "../ai/tafsir";
import type { StreakEngine } from "../streaks/engine";
import type { KeyedLock } from "../streaks/lock";
import type { MessageSelector } from "../streaks/messages";
import type { Language, Subject } from "../streaks/schema";
import type { StreakStore } from "../streaks/store";

/**
 * Everything the command handlers need, passed in explicitly.
 */
export type BotServices = {
  store: StreakStore;
  engine: StreakEngine;
  selector: MessageSelector;
  explainer: VerseExplainer;
  lock: KeyedLock;
  defaultLanguage: Language;
};

export type Sender = Pick<User, "id" | "username">;

export function subjectFor(services: BotServices, from: Sender): Promise<Subject> {
  return services.engine.getOrCreateSubject(from.id, from.username);
}

/**
 * The sender's language, or the default one if the store cannot be read.
 */
export async function languageFor(services: BotServices, from: Sender): Promise<Language> {
  try {
    return (await subjectFor(services, from)).language;
  } catch (e) {
    console.error(`[Bot] Could not load language for ${from.id}:`, e);
    return services.defaultLanguage;
  }
}
