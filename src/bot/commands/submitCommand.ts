import { finalizeWithReport } from "../../services/report.service.js";
import { SessionRelatedCommand } from "./sessionRelatedCommand.js";

export class SubmitCommand extends SessionRelatedCommand {
  public getRegex(): RegExp {
    return /^\/submit\b/i;
  }

  public getCommandId(): string {
    return "submit";
  }

  protected async process(): Promise<void> {
    const sess = this.requireSession();
    const { text } = await finalizeWithReport(
      sess.id,
      this.settings.passPercent,
      this.settings.cooldownDays
    );
    await this.sendMessage(text, { parse_mode: "MarkdownV2" });
    // open the review on card 1
    await this.showCard(sess, 1);
  }
}
