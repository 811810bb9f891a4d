import { escapeMdV2 } from "../bot/views.js";
import type { AdminStats } from "../domain/adminstats/types.js";

function num(n: number | null, suffix = ""): string {
  return n === null ? "n/a" : escapeMdV2(`${n}${suffix}`);
}

export class AdminStatsPresenter {
  public static toMarkdownV2(s: AdminStats, label: string): string {
    const heading =
      `*Admin stats* \\(${escapeMdV2(label)}\\)\n` +
      `*Window:* ${escapeMdV2(s.window.startIso)} — ${escapeMdV2(s.window.endIso)}`;

    const users =
      `*Users*\n` +
      `Total: *${s.users.usersTotal}*\n` +
      `Active in window: *${s.users.usersActiveWindow}*`;

    const usage =
      `*Usage by mode*\n` +
      s.usageByMode
        .map((m) => `• ${m.mode === "exam" ? "Exam" : "Practice"} — sessions: *${m.sessions}*, users: *${m.users}*`)
        .join("\n");

    const ex =
      `*Exam results*\n` +
      `Submitted: *${s.exam.submitted}*\n` +
      `Passes: *${s.exam.passes}*, Fails: *${s.exam.fails}*\n` +
      `Pass rate: *${num(s.exam.passRatePct, "%")}*\n` +
      `Avg score: *${num(s.exam.avgScorePct, "%")}*\n` +
      `Avg duration: *${num(s.exam.avgMinutes, " min")}*`;

    const deck =
      `*Deck*\n` +
      `Active cards: *${s.deck.activeCards}*\n` +
      `Retired cards: *${s.deck.retiredCards}*`;

    return `${heading}\n\n${users}\n\n${usage}\n\n${ex}\n\n${deck}`;
  }
}
