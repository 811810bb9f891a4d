import type { AdminStatsService } from "../domain/adminstats/adminStatsService.js";
import type { BotService } from "./bot.service.js";
import type { CardService } from "./card.service.js";
import type { ReportService } from "./report.service.js";
import type { SessionService } from "./session.service.js";
import type { UserService } from "./user.service.js";

export interface Services {
  userService: UserService;
  sessionService: SessionService;
  cardService: CardService;
  reportService: ReportService;
  botService: BotService;
  adminStatsService: AdminStatsService;
}

export interface BotSettings {
  deckSize: number;
  passPercent: number;
  cooldownDays: number;
  adminIds: readonly number[];
}
