import { SessionRelatedCommand } from "./sessionRelatedCommand.js";

export class QuitCommand extends SessionRelatedCommand {
  public getRegex(): RegExp {
    return /^\/quit\b/i;
  }

  public getCommandId(): string {
    return "quit";
  }

  protected async process(): Promise<void> {
    const sess = this.requireSession();
    await this.sessionService.abandonSession(sess.id);
    await this.sendMessage("Session dropped. It won't count towards anything. /practice to start over.");
  }
}
