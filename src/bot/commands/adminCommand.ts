import { isAdmin } from "../../security/admin.js";
import { BaseCommand } from "./baseCommand.js";

export abstract class AdminCommand extends BaseCommand {
  protected async validate(): Promise<boolean> {
    if (isAdmin(this.tgId, this.settings.adminIds)) return true;
    await this.sendMessage("Admins only.");
    return false;
  }
}
