import TelegramBot from "node-telegram-bot-api";
import { createAdminStatsService } from "../domain/adminstats/adminStatsServiceImpl.js";
import { logger } from "../logger.js";
import { createBotService, type BotService } from "../services/bot.service.js";
import { cardService } from "../services/card.service.js";
import { reportService } from "../services/report.service.js";
import { sessionService } from "../services/session.service.js";
import type { BotSettings, Services } from "../services/services.js";
import { userService } from "../services/user.service.js";
import { registerCommands } from "./commands.js";
import { registerCardHandlers } from "./handlers/card.handler.js";
import type { BaseCardProcessor } from "./handlers/processors/baseCardProcessor.js";
import { NavProcessor } from "./handlers/processors/navProcessor.js";
import { RevealProcessor } from "./handlers/processors/revealProcessor.js";
import { SubmitProcessor } from "./handlers/processors/submitProcessor.js";
import { VerdictProcessor } from "./handlers/processors/verdictProcessor.js";

export function buildServices(botService: BotService): Services {
  return {
    userService,
    sessionService,
    cardService,
    reportService,
    botService,
    adminStatsService: createAdminStatsService(),
  };
}

/**
 * Wire commands and card callbacks onto a bot service.
 */
export function registerBot(services: Services, settings: BotSettings): void {
  const processors: BaseCardProcessor[] = [
    new RevealProcessor(services.botService, settings),
    new VerdictProcessor(services.botService, settings),
    new NavProcessor(services.botService, settings),
    new SubmitProcessor(services.botService, settings),
  ];
  registerCommands(services, settings);
  registerCardHandlers(services.botService, processors);
}

export async function createBot(
  token: string,
  settings: BotSettings
): Promise<{ bot: TelegramBot; services: Services }> {
  const bot = new TelegramBot(token, {
    polling: {
      autoStart: false,
      params: {
        timeout: 30,
        limit: 100,
        allowed_updates: ["message", "callback_query"],
      },
    },
  });

  // keep queued updates
  await bot.deleteWebHook();
  const services = buildServices(createBotService(bot));
  registerBot(services, settings);

  await bot.startPolling({ restart: true });
  logger.info("Polling started.");

  const me = await bot.getMe();
  logger.info(`Logged in as @${me.username ?? me.first_name}`);

  return { bot, services };
}
