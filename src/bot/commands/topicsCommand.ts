import { renderTopics } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

export class TopicsCommand extends BaseCommand {
  protected validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public getRegex(): RegExp {
    return /^\/topics\b/i;
  }

  public getCommandId(): string {
    return "topics";
  }

  protected async process(): Promise<void> {
    const counts = await this.cardService.topicCounts();
    await this.sendMessage(renderTopics(counts), { parse_mode: "MarkdownV2" });
  }
}
