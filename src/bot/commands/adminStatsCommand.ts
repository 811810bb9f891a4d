import type { AdminStatsService } from "../../domain/adminstats/adminStatsService.js";
import { AdminStatsPresenter } from "../../presentation/adminStatsPresenter.js";
import type { BotSettings, Services } from "../../services/services.js";
import type { BotMessage } from "./baseCommand.js";
import { AdminCommand } from "./adminCommand.js";

export class AdminStatsCommand extends AdminCommand {
  private readonly adminStatsService: AdminStatsService;

  public constructor(
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services,
    settings: BotSettings
  ) {
    super(msg, match, services, settings);
    this.adminStatsService = services.adminStatsService;
  }

  public getCommandId(): string {
    return "admin_stats";
  }

  // Supports: /admin_stats         -> default 30d
  //           /admin_stats 7d      -> last 7 days
  public getRegex(): RegExp {
    return /^\/admin_stats(?:\s+(\d{1,3})d)?$/i;
  }

  protected async process(): Promise<void> {
    const days = this.match?.[1] ? Math.max(1, Math.min(365, Number(this.match[1]))) : 30;
    const end = new Date();
    const start = new Date(end.getTime() - days * 86400_000);

    const stats = await this.adminStatsService.getAdminStats(
      { startIso: start.toISOString(), endIso: end.toISOString() },
      this.settings.passPercent
    );
    await this.sendMessage(AdminStatsPresenter.toMarkdownV2(stats, `${days}d`), {
      parse_mode: "MarkdownV2",
    });
  }
}
