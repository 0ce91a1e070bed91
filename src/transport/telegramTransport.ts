// src/transport/telegramTransport.ts
import { Markup } from "telegraf";
import type { ChatTransport, OutboundReply } from "./chatTransport";

export function replyMarkup(suggestedReplies: readonly string[]) {
  if (suggestedReplies.length === 0) return Markup.removeKeyboard();
  return Markup.keyboard([suggestedReplies.map((label) => Markup.button.text(label))]).resize();
}

// The slice of bot.telegram this transport uses
type MessageSender = {
  sendMessage(chatId: string, text: string, extra: ReturnType<typeof replyMarkup>): Promise<unknown>;
};

/** Session keys are Telegram chat ids. */
export class TelegramTransport implements ChatTransport {
  constructor(private readonly telegram: MessageSender) {}

  async send(reply: OutboundReply): Promise<void> {
    await this.telegram.sendMessage(reply.sessionKey, reply.text, replyMarkup(reply.suggestedReplies));
  }
}
