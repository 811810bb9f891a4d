import { humanTimeLeft } from "../../services/timer.service.js";
import { renderProgress } from "../views.js";
import { SessionRelatedCommand } from "./sessionRelatedCommand.js";

export class ProgressCommand extends SessionRelatedCommand {
  public getRegex(): RegExp {
    return /^\/progress\b/i;
  }

  public getCommandId(): string {
    return "progress";
  }

  protected async process(): Promise<void> {
    const sess = this.requireSession();
    const p = await this.sessionService.progressForSession(sess.id);
    const secs = await this.sessionService.remainingSeconds(sess.id);
    await this.sendMessage(
      renderProgress(p, secs === null ? undefined : humanTimeLeft(secs)),
      { parse_mode: "MarkdownV2" }
    );
    await this.showCard(sess);
  }
}
