import type { Language } from "./schema";

export type Strings = {
  completed: string;
  alreadyCompleted: string;
  streakHeader: (days: number) => string;
  inactivityHeader: (days: number) => string;
  startHeader: string;
  welcome: string;
  rewardFallback: (days: number) => string;
  rewardDefaultMessage: string;
  warningFallback: (days: number) => string;
  warningDefaultMessage: (days: number) => string;
  reminderTitle: string;
  reminderFallback: string;
  streakTitle: string;
  doneToday: string;
  notDoneToday: string;
  endOfDayStreakTitle: string;
  endOfDayInactiveTitle: string;
  endOfDayDefaultText: string;
  endOfDayStreakCall: (days: number) => string;
  endOfDayStreakFallback: (days: number) => string;
  endOfDayInactiveFallback: (days: number) => string;
  retry: string;
  guide: string;
  help: string;
  timezoneUsage: string;
  timezoneSet: (zone: string) => string;
  timezoneInvalid: (zone: string) => string;
  reminderUsage: string;
  reminderInvalid: (value: string) => string;
  reminderAdded: (time: string, zone: string) => string;
  reminderExists: (time: string) => string;
  reminderList: (times: string[], zone: string) => string;
  noReminders: string;
  reminderDeleted: (time: string) => string;
  reminderNotFound: (time: string) => string;
  chooseReminderToDelete: string;
  processing: string;
  explainFailed: string;
};

const en: Strings = {
  completed: "✅ You've completed your daily portion!",
  alreadyCompleted:
    "✅ You've already completed your daily portion!\n\n" +
    "Great job! You've already recorded your reading for today. Come back tomorrow to continue your streak.",
  streakHeader: (days) => `🔥 Your current streak: ${days} days`,
  inactivityHeader: (days) => `⚠️ Days of inactivity: ${days} days`,
  startHeader: "📚 Start your reading streak today!",
  welcome: "Ready to start your Quran reading journey? Send a checkmark when you're done! 📚",
  rewardFallback: (days) =>
    `Amazing! You've maintained your Quran reading streak for ${days} days! 🎉`,
  rewardDefaultMessage:
    "Keep up your daily Quran reading streak! Every day brings you closer to Allah.",
  warningFallback: (days) =>
    `Don't worry! It's been ${days} days since your last check-in. You can start again today! 📖`,
  warningDefaultMessage: (days) =>
    `It's been ${days} days since your last Quran reading. Resume your journey today!`,
  reminderTitle: "⏰ Quran Reading Reminder",
  reminderFallback: "It's time for your daily Quran reading! Keep up your streak! 📖",
  streakTitle: "📊 Your Quran Reading Streak",
  doneToday: "✅ Today's portion: done",
  notDoneToday: "⏳ Today's portion: not yet",
  endOfDayStreakTitle: "⚠️ Streak Break Alert",
  endOfDayInactiveTitle: "📖 Daily Reading Reminder",
  endOfDayDefaultText: "You haven't read the Quran today yet!",
  endOfDayStreakCall: (days) =>
    `Your ${days}-day streak will break at midnight. You still have time to read and send a checkmark to maintain your streak! ✅`,
  endOfDayStreakFallback: (days) =>
    `You haven't read the Quran today! Your ${days}-day streak will break at midnight.\n\n` +
    "You still have time to read and send a checkmark to maintain your streak! 📖",
  endOfDayInactiveFallback: (days) =>
    `It's been ${days} days since your last Quran reading. Resume your journey today!`,
  retry: "⚠️ Something went wrong while saving your progress. Please try again in a moment.",
  guide:
    "Welcome to Quran Companion! 📖✨\n\n" +
    "This bot helps you stay consistent with your daily Quran reading and reflection.\n\n" +
    "• Get tafsir: send a verse as Arabic text, a reference (e.g. 2:255) or a photo\n" +
    "• Track your reading: send ✅ after reading to keep your streak\n" +
    "• Reminders: set daily reminders with /setreminder\n\n" +
    "Use /help to see all commands.",
  help:
    "📖 Quran Companion Help 📖\n\n" +
    "Send Arabic text, a verse reference (e.g. 108:1) or a photo of a verse to get its tafsir.\n" +
    "Send ✅ after your daily reading to record it.\n\n" +
    "Commands:\n" +
    "/start - Choose your language\n" +
    "/help - Show this help message\n" +
    "/streak - Show your current streak\n" +
    "/settimezone <Region/City> - Set your timezone (e.g. /settimezone Asia/Riyadh)\n" +
    "/setreminder HH:MM - Add a daily reminder (24-hour, your timezone)\n" +
    "/listreminders - Show your reminders\n" +
    "/deletereminder [HH:MM] - Delete a reminder",
  timezoneUsage: "Usage: /settimezone <Region/City>, e.g. /settimezone Europe/London",
  timezoneSet: (zone) => `🌍 Your timezone is now ${zone}.`,
  timezoneInvalid: (zone) =>
    `'${zone}' is not a known timezone. Use a Region/City name such as America/New_York.`,
  reminderUsage: "Usage: /setreminder HH:MM (24-hour), e.g. /setreminder 05:30",
  reminderInvalid: (value) => `'${value}' is not a valid time. Use HH:MM in 24-hour format.`,
  reminderAdded: (time, zone) => `⏰ Daily reminder set for ${time} (${zone}).`,
  reminderExists: (time) => `You already have a reminder at ${time}.`,
  reminderList: (times, zone) => `⏰ Your daily reminders (${zone}):\n${times.map((t) => `- ${t}`).join("\n")}`,
  noReminders: "You have no reminders. Add one with /setreminder HH:MM.",
  reminderDeleted: (time) => `❌ Reminder at ${time} deleted.`,
  reminderNotFound: (time) => `No reminder found at ${time}.`,
  chooseReminderToDelete: "Select a reminder to delete:",
  processing: "Processing...",
  explainFailed: "Sorry, I couldn't process that. Please try again with a verse text, a reference or a clear photo.",
};

const ar: Strings = {
  completed: "✅ لقد أكملت وردك اليومي!",
  alreadyCompleted:
    "✅ لقد أكملت بالفعل وردك اليومي!\n\n" +
    "أحسنت! لقد سجلت قراءتك بالفعل اليوم. عد غدًا لمواصلة سلسلة القراءة الخاصة بك.",
  streakHeader: (days) => `🔥 لديك سلسلة قراءة مستمرة منذ ${days} أيام`,
  inactivityHeader: (days) => `⚠️ أيام الانقطاع: ${days} أيام`,
  startHeader: "📚 ابدأ سلسلة القراءة الخاصة بك اليوم!",
  welcome: "هل أنت مستعد لبدء رحلة قراءة القرآن؟ أرسل علامة اختيار عندما تنتهي! 📚",
  rewardFallback: (days) => `رائع! لقد حافظت على سلسلة قراءة القرآن لمدة ${days} أيام! 🎉`,
  rewardDefaultMessage: "حافظ على سلسلة قراءة القرآن اليومية! كل يوم يقربك من الله.",
  warningFallback: (days) =>
    `لا تقلق! لقد مرت ${days} أيام منذ آخر تسجيل دخول. يمكنك البدء مرة أخرى اليوم! 📖`,
  warningDefaultMessage: (days) =>
    `لقد مضت ${days} أيام منذ آخر قراءة للقرآن. استأنف رحلتك اليوم!`,
  reminderTitle: "⏰ تذكير قراءة القرآن",
  reminderFallback: "حان وقت قراءة القرآن اليومية! حافظ على تواصلك! 📖",
  streakTitle: "📊 سلسلة قراءة القرآن الخاصة بك",
  doneToday: "✅ ورد اليوم: تم",
  notDoneToday: "⏳ ورد اليوم: لم يكتمل بعد",
  endOfDayStreakTitle: "⚠️ تنبيه انقطاع القراءة",
  endOfDayInactiveTitle: "📖 تذكير القراءة اليومية",
  endOfDayDefaultText: "لم تقرأ القرآن اليوم بعد!",
  endOfDayStreakCall: (days) =>
    `سلسلة قراءتك المستمرة لمدة ${days} أيام ستنقطع عند منتصف الليل. ما زال لديك وقت للقراءة وإرسال علامة اختيار للحفاظ على سلسلتك! ✅`,
  endOfDayStreakFallback: (days) =>
    `لقد انقطعت عن القراءة اليوم! سلسلة قراءتك المستمرة لمدة ${days} أيام ستنقطع عند منتصف الليل.\n\n` +
    "ما زال لديك وقت للقراءة وإرسال علامة اختيار للحفاظ على سلسلتك! 📖",
  endOfDayInactiveFallback: (days) =>
    `لقد مرت ${days} أيام منذ آخر قراءة للقرآن. استأنف رحلتك اليوم!`,
  retry: "⚠️ حدث خطأ أثناء حفظ تقدمك. يرجى المحاولة مرة أخرى بعد قليل.",
  guide:
    "مرحبًا بك في رفيق القرآن! 📖✨\n\n" +
    "هذا البوت يساعدك على المواظبة على قراءة وتدبر وِردك اليومي من القرآن الكريم.\n\n" +
    "• الحصول على التفسير: أرسل آية كنص عربي أو رقم الآية (مثل ٢:٢٥٥) أو صورة\n" +
    "• تتبع القراءة: أرسل ✅ بعد القراءة للحفاظ على سلسلة المواظبة\n" +
    "• التذكيرات: اضبط تذكيرات يومية باستخدام /setreminder\n\n" +
    "استخدم /help لعرض جميع الأوامر.",
  help:
    "📖 دليل المساعدة لرفيق القرآن 📖\n\n" +
    "أرسل نصًا عربيًا أو رقم الآية (مثل ١٠٨:١) أو صورة لآية للحصول على تفسيرها.\n" +
    "أرسل ✅ بعد قراءتك اليومية لتسجيلها.\n\n" +
    "الأوامر:\n" +
    "/start - اختيار اللغة\n" +
    "/help - عرض رسالة المساعدة هذه\n" +
    "/streak - عرض سلسلة الاستمرارية الحالية\n" +
    "/settimezone <Region/City> - تعيين المنطقة الزمنية (مثال: /settimezone Asia/Riyadh)\n" +
    "/setreminder HH:MM - إضافة تذكير يومي (بتنسيق 24 ساعة حسب منطقتك الزمنية)\n" +
    "/listreminders - عرض تذكيراتك\n" +
    "/deletereminder [HH:MM] - حذف تذكير",
  timezoneUsage: "الاستخدام: /settimezone <Region/City>، مثال: /settimezone Asia/Riyadh",
  timezoneSet: (zone) => `🌍 تم تعيين منطقتك الزمنية إلى ${zone}.`,
  timezoneInvalid: (zone) =>
    `'${zone}' ليست منطقة زمنية معروفة. استخدم صيغة المنطقة/المدينة مثل Asia/Riyadh.`,
  reminderUsage: "الاستخدام: /setreminder HH:MM (بتنسيق 24 ساعة)، مثال: /setreminder 05:30",
  reminderInvalid: (value) => `'${value}' ليس وقتًا صحيحًا. استخدم HH:MM بتنسيق 24 ساعة.`,
  reminderAdded: (time, zone) => `⏰ تم ضبط تذكير يومي في ${time} (${zone}).`,
  reminderExists: (time) => `لديك بالفعل تذكير في ${time}.`,
  reminderList: (times, zone) => `⏰ تذكيراتك اليومية (${zone}):\n${times.map((t) => `- ${t}`).join("\n")}`,
  noReminders: "ليس لديك تذكيرات. أضف تذكيرًا باستخدام /setreminder HH:MM.",
  reminderDeleted: (time) => `❌ تم حذف التذكير في ${time}.`,
  reminderNotFound: (time) => `لا يوجد تذكير في ${time}.`,
  chooseReminderToDelete: "اختر تذكيرًا لحذفه:",
  processing: "جاري المعالجة...",
  explainFailed: "عذرًا، لم أتمكن من معالجة ذلك. حاول مرة أخرى بنص الآية أو رقمها أو صورة واضحة.",
};

const strings: Record<Language, Strings> = { en, ar };

export function t(language: Language): Strings {
  return strings[language];
}
