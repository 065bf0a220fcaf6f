import type { Telegram } from "telegraf";
import type { NotificationDispatcher } from "../streaks/scheduler";
import { DispatchError, describeError } from "../errors";
import { withTimeout } from "../utils/timeout";

/**
 * Delivers notifications through the Telegram Bot API.
 * Any failure, including a timeout, surfaces as a DispatchError.
 */
export class TelegramDispatcher implements NotificationDispatcher {
  constructor(
    private readonly telegram: Pick<Telegram, "sendMessage">,
    private readonly timeoutMs: number,
  ) {}

  async sendMessage(chatId: number, text: string): Promise<void> {
    try {
      await withTimeout(
        this.telegram.sendMessage(chatId, text),
        this.timeoutMs,
        `sendMessage to ${chatId}`,
        (message) => new DispatchError(message, chatId),
      );
    } catch (e) {
      if (e instanceof DispatchError) throw e;
      throw new DispatchError(`Failed to send to ${chatId}: ${describeError(e)}`, chatId, e);
    }
  }
}
