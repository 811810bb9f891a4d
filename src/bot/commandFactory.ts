import type TelegramBot from "node-telegram-bot-api";
import type { BaseCommand, BotMessage } from "./commands/baseCommand.js";
import type { BotSettings, Services } from "../services/services.js";

export interface CommandClass {
  new (
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services,
    settings: BotSettings
  ): BaseCommand;
  prototype: BaseCommand;
}

export function toBotMessage(msg: TelegramBot.Message): BotMessage {
  return {
    chatId: msg.chat.id,
    from: msg.from
      ? {
          id: msg.from.id,
          first_name: msg.from.first_name,
          last_name: msg.from.last_name,
          username: msg.from.username,
        }
      : { id: 0 },
  };
}

export class CommandFactory {
  #commands: Map<string, CommandClass> = new Map();
  #services: Services;
  #settings: BotSettings;

  constructor(services: Services, settings: BotSettings) {
    this.#services = services;
    this.#settings = settings;
  }

  registerCommand(commandClass: CommandClass): void {
    this.#commands.set(commandClass.prototype.getCommandId(), commandClass);
  }

  submit(): void {
    for (const commandClass of this.#commands.values()) {
      const regex = commandClass.prototype.getRegex();
      this.#services.botService.onText(
        regex,
        async (msg: TelegramBot.Message, match: RegExpExecArray | null) => {
          // channel posts and service messages carry no sender
          if (!msg.from) return;
          const command = new commandClass(toBotMessage(msg), match, this.#services, this.#settings);
          await command.execute();
        }
      );
    }
  }
}
