import type { StudySession } from "../../services/session.service.js";
import { BaseCommand } from "./baseCommand.js";

export abstract class SessionRelatedCommand extends BaseCommand {
  protected session: StudySession | undefined;

  protected async validate(): Promise<boolean> {
    this.session = await this.getActiveSession();
    if (!this.session) {
      await this.sendMessage("No active session. Use /practice or /exam.");
      return false;
    }
    return true;
  }

  protected requireSession(): StudySession {
    if (!this.session) throw new Error("Session missing after validation");
    return this.session;
  }
}
