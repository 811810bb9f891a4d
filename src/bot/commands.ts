import type { BotSettings, Services } from "../services/services.js";
import { CommandFactory } from "./commandFactory.js";
import { AdminStatsCommand } from "./commands/adminStatsCommand.js";
import { ExamCommand } from "./commands/examCommand.js";
import { HealthCommand } from "./commands/healthCommand.js";
import { PracticeCommand } from "./commands/practiceCommand.js";
import { ProgressCommand } from "./commands/progressCommand.js";
import { QuitCommand } from "./commands/quitCommand.js";
import { StartCommand } from "./commands/startCommand.js";
import { SubmitCommand } from "./commands/submitCommand.js";
import { TopicsCommand } from "./commands/topicsCommand.js";

export function registerCommands(services: Services, settings: BotSettings): CommandFactory {
  const commandFactory = new CommandFactory(services, settings);
  commandFactory.registerCommand(StartCommand);
  commandFactory.registerCommand(TopicsCommand);
  commandFactory.registerCommand(PracticeCommand);
  commandFactory.registerCommand(ExamCommand);
  commandFactory.registerCommand(ProgressCommand);
  commandFactory.registerCommand(SubmitCommand);
  commandFactory.registerCommand(QuitCommand);
  commandFactory.registerCommand(AdminStatsCommand);
  commandFactory.registerCommand(HealthCommand);

  commandFactory.submit();
  return commandFactory;
}
