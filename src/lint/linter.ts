import type { ContentDocument } from "../content/types.js";
import { ALL_RULES } from "./rules.js";
import type { LintIssue, LintOptions, LintReport, LintRule } from "./types.js";

export function lintDocument(
  doc: ContentDocument,
  options: LintOptions = {},
  rules: readonly LintRule[] = ALL_RULES
): LintIssue[] {
  const issues: LintIssue[] = [];
  for (const rule of rules) {
    const setting = options.rules?.[rule.id] ?? rule.defaultSeverity;
    if (setting === "off") continue;
    for (const finding of rule.check(doc)) {
      issues.push({
        rule: rule.id,
        severity: setting,
        file: doc.file,
        line: finding.line,
        message: finding.message,
      });
    }
  }
  return issues.sort((a, b) => a.line - b.line);
}

export function lintDocuments(
  docs: ContentDocument[],
  options: LintOptions = {},
  rules: readonly LintRule[] = ALL_RULES
): LintReport {
  const issues = docs
    .flatMap((d) => lintDocument(d, options, rules))
    .sort((a, b) =>
      a.file === b.file ? a.line - b.line : a.file < b.file ? -1 : 1
    );

  return {
    issues,
    errorCount: issues.filter((i) => i.severity === "error").length,
    warningCount: issues.filter((i) => i.severity === "warning").length,
    filesChecked: docs.length,
    pairsChecked: docs.reduce((n, d) => n + d.pairs.length, 0),
  };
}

export function formatIssue(issue: LintIssue): string {
  return `${issue.file}:${issue.line} ${issue.severity} ${issue.rule} ${issue.message}`;
}

export function formatSummary(report: LintReport): string {
  return `${report.filesChecked} file(s), ${report.pairsChecked} question(s): ${report.errorCount} error(s), ${report.warningCount} warning(s)`;
}
