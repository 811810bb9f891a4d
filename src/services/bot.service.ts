import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../logger.js";

/**
 * The slice of the Telegram client the bot uses; tests provide a fake.
 */
export interface BotService {
  onCallbackQuery(listener: (q: TelegramBot.CallbackQuery) => Promise<void>): void;

  onText(
    regexp: RegExp,
    callback: (msg: TelegramBot.Message, match: RegExpExecArray | null) => Promise<void>
  ): void;

  sendMessage(
    chatId: TelegramBot.ChatId,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<TelegramBot.Message | undefined>;

  editMessageText(
    text: string,
    options?: TelegramBot.EditMessageTextOptions
  ): Promise<TelegramBot.Message | boolean>;

  answerCallbackQuery(
    callbackQueryId: string,
    options?: Partial<TelegramBot.AnswerCallbackQueryOptions>
  ): Promise<boolean>;

  editMessageReplyMarkup(
    replyMarkup: TelegramBot.InlineKeyboardMarkup,
    options?: TelegramBot.EditMessageReplyMarkupOptions
  ): Promise<TelegramBot.Message | boolean>;
}

function logHandlerError(where: string, error: unknown): void {
  logger.error(`Unhandled error in ${where}`, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
}

export function createBotService(bot: TelegramBot): BotService {
  return {
    sendMessage: async (chatId, text, options) => {
      try {
        return await bot.sendMessage(chatId, text, options);
      } catch (error) {
        logger.error("Error sending message", { chatId, error: String(error) });
        return undefined;
      }
    },
    editMessageText: async (text, options) => {
      try {
        return await bot.editMessageText(text, options);
      } catch (error) {
        // "message is not modified" counts as success
        if (error instanceof Error && error.message.includes("message is not modified")) {
          return true;
        }
        logger.error("Error editing message text", { error: String(error) });
        return false;
      }
    },
    answerCallbackQuery: (callbackQueryId, options) =>
      bot.answerCallbackQuery(callbackQueryId, options),
    editMessageReplyMarkup: async (replyMarkup, options) => {
      try {
        return await bot.editMessageReplyMarkup(replyMarkup, options);
      } catch (error) {
        if (error instanceof Error && error.message.includes("message is not modified")) {
          return true;
        }
        logger.error("Error editing reply markup", { error: String(error) });
        return false;
      }
    },
    onText: (regexp, callback) => {
      bot.onText(regexp, (msg, match) => {
        callback(msg, match).catch((e: unknown) => logHandlerError("onText", e));
      });
    },
    onCallbackQuery: (listener) => {
      bot.on("callback_query", (q) => {
        listener(q).catch((e: unknown) => logHandlerError("callback_query", e));
      });
    },
  };
}
