import { TOPICS } from "../../content/types.js";
import { escapeMdV2 } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

export class ExamCommand extends BaseCommand {
  protected async validate(): Promise<boolean> {
    const { ok, nextIso } = await this.userService.canStartExam(
      this.userId,
      this.settings.cooldownDays
    );
    if (!ok) {
      await this.sendMessage(
        `⛔ You failed the last exam\\. Next attempt available on *${escapeMdV2(nextIso ?? "")}*\\. Keep going with /practice meanwhile\\.`,
        { parse_mode: "MarkdownV2" }
      );
      return false;
    }
    return true;
  }

  public getRegex(): RegExp {
    return /^\/exam\b/i;
  }

  public getCommandId(): string {
    return "exam";
  }

  protected async process(): Promise<void> {
    await this.startSession("exam", TOPICS, true);
  }
}
