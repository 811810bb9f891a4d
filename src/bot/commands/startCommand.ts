import { EXAM_DURATION_MIN } from "../../domain/policy.js";
import { escapeMdV2 } from "../views.js";
import { BaseCommand, mdv2Cmd } from "./baseCommand.js";

export class StartCommand extends BaseCommand {
  protected validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public getRegex(): RegExp {
    return /^\/start\b/i;
  }

  public getCommandId(): string {
    return "start";
  }

  protected async process(): Promise<void> {
    const sess = await this.getActiveSession();
    const hint = sess
      ? "You have an active session: /progress shows where you are."
      : "Pick a topic with /topics, or jump in with /practice.";

    const text =
      `Welcome, ${escapeMdV2(this.firstName ?? "there")}\\! 👋\n` +
      `Flashcards for *HTML*, *CSS*, *JavaScript* and *TypeScript* interviews\\.\n\n` +
      `Commands:\n` +
      `• ${mdv2Cmd("topics")} — topics and card counts 🗂\n` +
      `• ${mdv2Cmd("practice")} \\[topic\\] — untimed practice 📘\n` +
      `• ${mdv2Cmd("exam")} — timed exam, ${EXAM_DURATION_MIN} minutes 🧪\n` +
      `• ${mdv2Cmd("progress")} — current status 📊\n` +
      `• ${mdv2Cmd("submit")} — finish and score ✅\n` +
      `• ${mdv2Cmd("quit")} — drop the current session 🗑\n\n` +
      escapeMdV2(hint);

    await this.sendMessage(text, { parse_mode: "MarkdownV2" });
  }
}
