import { topicLabel } from "../../content/topics.js";
import { escapeMdV2 } from "../views.js";
import { AdminCommand } from "./adminCommand.js";

export class HealthCommand extends AdminCommand {
  public getCommandId(): string {
    return "health";
  }

  public getRegex(): RegExp {
    return /^\/health$/;
  }

  protected async process(): Promise<void> {
    const counts = await this.cardService.topicCounts();
    const total = counts.reduce((n, c) => n + c.cards, 0);
    const topics =
      counts.map((c) => `${escapeMdV2(topicLabel(c.topic))}=*${c.cards}*`).join(", ") || "none";
    const text =
      `*Health*\n` +
      `topics: ${topics}\n` +
      `active cards: *${total}*\n` +
      `deck size: *${this.settings.deckSize}*, pass: *${this.settings.passPercent}%*`;
    await this.sendMessage(text, { parse_mode: "MarkdownV2" });
  }
}
