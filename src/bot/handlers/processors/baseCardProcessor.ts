import type TelegramBot from "node-telegram-bot-api";
import type { BotService } from "../../../services/bot.service.js";
import type { BotSettings } from "../../../services/services.js";
import { logger } from "../../../logger.js";
import { showCard } from "../card.handler.js";

/** Parsed `<action>:<sessionId>:<index>` callback payload */
export class CallbackParserResult {
  public constructor(
    public readonly action: string,
    public readonly sessionId: string,
    public readonly index: number
  ) {}
}

export abstract class BaseCardProcessor {
  public constructor(
    protected readonly botService: BotService,
    protected readonly settings: BotSettings
  ) {}

  abstract readonly actions: readonly string[];
  abstract readonly processName: string;

  public parse(data: string): CallbackParserResult | null {
    const match = /^([a-z]+):([^:]+):(\d+)$/.exec(data);
    if (!match) return null;
    const [, action, sid, idxS] = match;
    if (!this.actions.includes(action)) return null;
    const index = parseInt(idxS, 10);
    if (!Number.isFinite(index) || index < 1) return null;
    return new CallbackParserResult(action, sid, index);
  }

  public async process(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: CallbackParserResult
  ): Promise<void> {
    try {
      await this.handle(msg, query, parsed);
    } catch (error) {
      logger.error(`Error in ${this.processName}`, {
        data: query.data,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.safeAnswerCallback(query.id, "Oops. Try again.");
    }
  }

  protected abstract handle(
    msg: TelegramBot.Message,
    query: TelegramBot.CallbackQuery,
    parsed: CallbackParserResult
  ): Promise<void>;

  protected refresh(msg: TelegramBot.Message, sessionId: string, index: number): Promise<void> {
    return showCard(this.botService, msg.chat.id, sessionId, index, msg.message_id);
  }

  protected async safeAnswerCallback(
    id: string | undefined,
    text?: string,
    showAlert: boolean = false
  ): Promise<void> {
    if (!id) return;
    try {
      await this.botService.answerCallbackQuery(id, text ? { text, show_alert: showAlert } : {});
    } catch (error) {
      // the query may have expired; the user just sees no toast
      logger.debug("answerCallbackQuery failed", { error: String(error) });
    }
  }
}
