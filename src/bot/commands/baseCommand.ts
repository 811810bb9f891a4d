import type TelegramBot from "node-telegram-bot-api";
import { TOPICS, type Topic } from "../../content/types.js";
import type { Mode } from "../../domain/policy.js";
import { EXAM_DURATION_MIN } from "../../domain/policy.js";
import { logger } from "../../logger.js";
import type { BotService } from "../../services/bot.service.js";
import type { CardService } from "../../services/card.service.js";
import type { SessionService, StudySession } from "../../services/session.service.js";
import type { BotSettings, Services } from "../../services/services.js";
import type { UserService } from "../../services/user.service.js";
import { showCard } from "../handlers/card.handler.js";
import { escapeMdV2 } from "../views.js";

export interface BotMessageFrom {
  id: number;
  first_name?: string;
  last_name?: string;
  username?: string;
}

export interface BotMessage {
  chatId: number;
  from: BotMessageFrom;
}

const MODE_GREETINGS: Record<Mode, string> = {
  exam: `Exam started\\! ⏱ ${EXAM_DURATION_MIN} minutes\\. Reveal each answer, then grade yourself honestly\\.`,
  practice: "Practice started 📘 \\(untimed\\)\\.",
};

export abstract class BaseCommand {
  protected readonly tgId: number;
  protected readonly firstName: string | undefined;
  protected readonly lastName: string | undefined;
  protected readonly username: string | undefined;
  protected readonly msg: BotMessage;
  protected readonly match: RegExpExecArray | null;
  protected readonly settings: BotSettings;
  protected readonly userService: UserService;
  protected readonly sessionService: SessionService;
  protected readonly cardService: CardService;
  protected readonly botService: BotService;
  protected userId = 0;

  public constructor(
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services,
    settings: BotSettings
  ) {
    this.msg = msg;
    this.tgId = msg.from.id;
    this.firstName = msg.from.first_name;
    this.lastName = msg.from.last_name;
    this.username = msg.from.username;
    this.match = match;
    this.settings = settings;
    this.sessionService = services.sessionService;
    this.userService = services.userService;
    this.cardService = services.cardService;
    this.botService = services.botService;
  }

  protected upsertUser(): Promise<number> {
    return this.userService.upsertUser({
      tg_user_id: this.tgId,
      first_name: this.firstName,
      last_name: this.lastName,
      username: this.username,
    });
  }

  protected getActiveSession(): Promise<StudySession | undefined> {
    return this.sessionService.getActiveSessionForUser(this.userId);
  }

  protected async sendMessage(
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<void> {
    await this.botService.sendMessage(this.msg.chatId, text, options);
  }

  protected async showCard(sess: StudySession, index: number = sess.current_index): Promise<void> {
    await showCard(this.botService, this.msg.chatId, sess.id, index);
  }

  /**
   * Resume the active session, or draw a new deck from `topics`.
   * With `requireFull` the deck must hold the configured size.
   */
  protected async startSession(
    mode: Mode,
    topics: readonly Topic[],
    requireFull: boolean
  ): Promise<void> {
    const existing = await this.getActiveSession();
    if (existing) {
      await this.sendMessage("You already have an active session. Showing your current card…");
      await this.showCard(existing);
      return;
    }

    const counts = await this.cardService.topicCounts();
    const usable = TOPICS.filter((t) => topics.includes(t));
    const available = counts
      .filter((c) => usable.includes(c.topic))
      .reduce((n, c) => n + c.cards, 0);
    if (available === 0) {
      await this.sendMessage("No cards available for that selection. See /topics.");
      return;
    }
    if (requireFull && available < this.settings.deckSize) {
      await this.sendMessage(
        `The deck has only ${available} card(s); an exam needs ${this.settings.deckSize}.`
      );
      return;
    }

    const size = Math.min(this.settings.deckSize, available);
    const sess = await this.sessionService.createStudySession(this.userId, mode, usable, size);
    await this.sendMessage(MODE_GREETINGS[mode], { parse_mode: "MarkdownV2" });
    await this.showCard(sess, 1);
  }

  public async execute(): Promise<void> {
    try {
      this.userId = await this.upsertUser();
      if (!(await this.validate())) return;
      await this.process();
    } catch (error) {
      logger.error(`Error in command ${this.getCommandId()}`, {
        chatId: this.msg.chatId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      await this.sendMessage("Sorry, an error occurred while processing your command.");
    }
  }

  protected abstract validate(): Promise<boolean>;

  protected abstract process(): Promise<void>;

  public abstract getCommandId(): string;

  public abstract getRegex(): RegExp;
}

export function mdv2Cmd(cmd: string): string {
  return `/${escapeMdV2(cmd)}`;
}
