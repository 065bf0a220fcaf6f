import { Context, Telegraf } from "telegraf";
import { OpenRouterVerseExplainer } from "./ai/tafsir";
import { handleCheckIn } from "./commands/checkin";
import { handleHelp } from "./commands/help";
import {
  DELETE_REMINDER_PREFIX,
  handleDeleteReminder,
  handleDeleteReminderCallback,
  handleListReminders,
  handleSetReminder,
} from "./commands/reminders";
import type { BotServices, Sender } from "./commands/services";
import { handleLanguageSelection, handleStart, languageFromButton } from "./commands/start";
import { handleStreak } from "./commands/streak";
import { handleTafsirPhoto, handleTafsirText } from "./commands/tafsir";
import { handleSetTimezone } from "./commands/timezone";
import { hasCheckMark, loadConfig, type AppConfig } from "./config";
import env from "./env";
import { StreakEngine } from "./streaks/engine";
import { KeyedLock } from "./streaks/lock";
import { MessageSelector } from "./streaks/messages";
import { ReminderScheduler } from "./streaks/scheduler";
import { FileStore, type StreakStore } from "./streaks/store";
import { SupabaseStore } from "./streaks/supabaseStore";
import { systemClock } from "./streaks/time";
import { TelegramDispatcher } from "./telegram/dispatcher";
import { withTimeout } from "./utils/timeout";

/**
 * Picks the Supabase store when it is configured, the JSON file store otherwise.
 */
function openStore(config: AppConfig): StreakStore {
  const defaults = { timezone: config.defaultTimezone, language: config.defaultLanguage };
  if (config.supabase) {
    console.log(`[Store] Using Supabase at ${config.supabase.url}`);
    return new SupabaseStore(
      config.supabase.url,
      config.supabase.key,
      defaults,
      config.storeTimeoutMs,
    );
  }
  return FileStore.open(config.storeFile, config.seedFile, defaults);
}

function senderOf(ctx: Context): Sender | null {
  return ctx.from ? { id: ctx.from.id, username: ctx.from.username } : null;
}

/**
 * Registers every command and message handler on the bot.
 */
function registerHandlers(bot: Telegraf, services: BotServices): void {
  bot.on("text", async (ctx, next) => {
    const text = ctx.message.text;

    // Pass to next middleware (command handlers) for messages starting with "/"
    if (text.startsWith("/")) {
      return next();
    }

    const from = senderOf(ctx);
    if (!from) return;

    const language = languageFromButton(text);
    if (language) {
      await handleLanguageSelection(ctx, services, from, language);
      return;
    }

    if (hasCheckMark(text)) {
      await handleCheckIn(ctx, services, from);
      return;
    }

    await handleTafsirText(ctx, services, from, text);
  });

  bot.on("photo", async (ctx) => {
    const from = senderOf(ctx);
    const photo = ctx.message.photo.at(-1);
    if (!from || !photo) return;

    if (ctx.message.caption && hasCheckMark(ctx.message.caption)) {
      await handleCheckIn(ctx, services, from);
      return;
    }
    await handleTafsirPhoto(ctx, services, from, photo.file_id);
  });

  // Command handlers
  bot.command("start", async (ctx) => {
    await handleStart(ctx);
  });

  bot.command("help", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleHelp(ctx, services, from);
  });

  bot.command("streak", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleStreak(ctx, services, from);
  });

  bot.command("settimezone", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleSetTimezone(ctx, services, from, ctx.payload);
  });

  bot.command("setreminder", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleSetReminder(ctx, services, from, ctx.payload);
  });

  bot.command("listreminders", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleListReminders(ctx, services, from);
  });

  bot.command("deletereminder", async (ctx) => {
    const from = senderOf(ctx);
    if (from) await handleDeleteReminder(ctx, services, from, ctx.payload);
  });

  // Callback query handler for inline buttons
  bot.on("callback_query", async (ctx) => {
    const callbackQuery = ctx.callbackQuery;

    // Handle only callback queries with data (not game queries)
    if (!("data" in callbackQuery) || !callbackQuery.data) {
      return;
    }

    const data = callbackQuery.data;
    if (data.startsWith(DELETE_REMINDER_PREFIX)) {
      const time = data.slice(DELETE_REMINDER_PREFIX.length);
      await handleDeleteReminderCallback(ctx, services, callbackQuery.from, time);
    }
  });

  /**
   * Catches middleware errors that aren't caught by specific handlers.
   */
  bot.catch((err, ctx) => {
    console.error("[Bot] Telegraf error", err);
    if (ctx && ctx.from) {
      ctx.reply("An error occurred while processing your request.").catch(console.error);
    }
  });
}

/**
 * Main async function that starts the bot with proper error handling and logging.
 */
async function main() {
  console.log("Starting bot...");

  const config = loadConfig();
  const bot = new Telegraf(env("TELEGRAM_BOT_TOKEN"));

  const store = openStore(config);
  const lock = new KeyedLock();
  const engine = new StreakEngine(store, {
    clock: systemClock(config.defaultTimezone),
    lock,
    defaultTimezone: config.defaultTimezone,
  });
  const selector = new MessageSelector(store);
  const scheduler = new ReminderScheduler({
    store,
    engine,
    selector,
    dispatcher: new TelegramDispatcher(bot.telegram, config.dispatchTimeoutMs),
    lock,
    options: {
      reminderTickMs: config.reminderTickMs,
      endOfDayTickMs: config.endOfDayTickMs,
      endOfDayStartHour: config.endOfDayStartHour,
      endOfDayEndHour: config.endOfDayEndHour,
      concurrency: config.tickConcurrency,
    },
  });

  registerHandlers(bot, {
    store,
    engine,
    selector,
    explainer: new OpenRouterVerseExplainer(),
    lock,
    defaultLanguage: config.defaultLanguage,
  });

  // Validate Telegram token by getting bot info
  console.log("Validating Telegram token...");
  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "getMe");
  console.log("Token validated...");

  // Launch polling (DO NOT await - polling runs indefinitely)
  console.log("Launching polling...");
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error("Failed to launch polling:", err);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exit(1);
  });

  console.log(`Bot started as @${botInfo.username}`);

  scheduler.start();
  console.log("Scheduler started");

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    bot.stop(signal);
    await scheduler.stop();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      });
    });
  }
}

// Run main function - this will initialize everything
main().catch((err) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});
