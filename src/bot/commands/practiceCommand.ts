import { resolveTopic } from "../../content/topics.js";
import { TOPICS, type Topic } from "../../content/types.js";
import { BaseCommand } from "./baseCommand.js";

// Supports: /practice             -> every topic
//           /practice css         -> one topic (aliases such as js, ts work)
export class PracticeCommand extends BaseCommand {
  private topics: readonly Topic[] = TOPICS;

  protected async validate(): Promise<boolean> {
    const arg = this.match?.[1];
    if (!arg) return true;
    const topic = resolveTopic(arg);
    if (!topic) {
      await this.sendMessage(`Unknown topic "${arg}". Try one of: ${TOPICS.join(", ")}.`);
      return false;
    }
    this.topics = [topic];
    return true;
  }

  public getRegex(): RegExp {
    return /^\/practice(?:@\w+)?(?:\s+(\S+))?\s*$/i;
  }

  public getCommandId(): string {
    return "practice";
  }

  protected async process(): Promise<void> {
    await this.startSession("practice", this.topics, false);
  }
}
