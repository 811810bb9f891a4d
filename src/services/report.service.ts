import { escapeMdV2 } from "../bot/views.js";
import { topicLabel } from "../content/topics.js";
import type { Mode } from "../domain/policy.js";
import type { GradeResult, TopicStats } from "./scoring.service.js";
import { finalizeAndSubmit } from "./session.service.js";
import { examEligibility } from "./user.service.js";

export interface ReportStrings {
  headline: string;
  detail: string;
  topics: string;
  footer: string;
}

export interface ReportContext {
  mode: Mode;
  passPercent: number;
  cooldownDays: number;
  /** YYYY-MM-DD when a failed exam can be retaken */
  nextEligibleIso: string | null;
}

/** All strings are MarkdownV2-ready. */
export function renderResultReport(result: GradeResult, ctx: ReportContext): ReportStrings {
  const passed = result.percent >= ctx.passPercent;
  const icon = ctx.mode === "practice" ? "📘" : passed ? "✅" : "❌";
  const headline = `${icon} *Score:* ${result.known}/${result.total} \\- *${result.percent}%* \\(pass ≥ ${ctx.passPercent}%\\)`;

  const unanswered =
    result.unanswered > 0 ? ` ${result.unanswered} card\\(s\\) left unanswered\\.` : "";
  const detail =
    ctx.mode === "practice"
      ? `Practice finished\\.${unanswered}`
      : passed
      ? `Great job\\! You met the passing threshold\\.${unanswered}`
      : `You didn't reach the threshold this time\\.${unanswered}`;

  const footer =
    ctx.mode === "practice" || passed
      ? "Start another round any time: /practice or /exam"
      : ctx.nextEligibleIso
      ? `You may retake the exam after *${ctx.cooldownDays} days*: available on *${escapeMdV2(ctx.nextEligibleIso)}*`
      : `You may retake the exam after *${ctx.cooldownDays} days*\\.`;

  return { headline, detail, topics: renderTopicTable(result.byTopic), footer };
}

function renderTopicTable(rows: TopicStats[]): string {
  const lines: string[] = ["*By topic:*"];
  for (const row of rows) {
    lines.push(`• _${escapeMdV2(topicLabel(row.topic))}_ \\- ${row.known}/${row.total}`);
  }
  return lines.join("\n");
}

export function joinReport(r: ReportStrings): string {
  return `${r.headline}\n\n${r.topics}\n\n${r.detail}\n\n${r.footer}`;
}

export interface ReportService {
  renderResultReport(result: GradeResult, ctx: ReportContext): ReportStrings;
  joinReport(r: ReportStrings): string;
}

export const reportService: ReportService = {
  renderResultReport,
  joinReport,
};

/**
 * Close a session and build its MarkdownV2 result report.
 */
export async function finalizeWithReport(
  sessionId: string,
  passPercent: number,
  cooldownDays: number
): Promise<{ text: string; passed: boolean; result: GradeResult }> {
  const { result, passed, session } = await finalizeAndSubmit(sessionId, passPercent);
  const nextEligibleIso =
    session.mode === "exam" && !passed
      ? examEligibility(session.finished_at, cooldownDays).nextIso
      : null;
  const report = renderResultReport(result, {
    mode: session.mode,
    passPercent,
    cooldownDays,
    nextEligibleIso,
  });
  return { text: joinReport(report), passed, result };
}
