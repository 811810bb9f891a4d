import type { ContentDocument } from "../content/types.js";

export type LintSeverity = "error" | "warning";
export type RuleSetting = LintSeverity | "off";

export type RuleId =
  | "answer-missing"
  | "code-syntax"
  | "unclosed-fence"
  | "code-language"
  | "duplicate-question"
  | "heading-increment"
  | "document-title";

export interface LintIssue {
  rule: RuleId;
  severity: LintSeverity;
  file: string;
  line: number;
  message: string;
}

/** What a rule reports before severity is applied */
export type RuleFinding = Pick<LintIssue, "line" | "message">;

export interface LintRule {
  id: RuleId;
  defaultSeverity: LintSeverity;
  description: string;
  check(doc: ContentDocument): RuleFinding[];
}

export interface LintOptions {
  rules?: Partial<Record<RuleId, RuleSetting>>;
}

export interface LintReport {
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
  filesChecked: number;
  pairsChecked: number;
}

/** A problem inside a code snippet; line is 1-based within the snippet */
export interface SyntaxProblem {
  line: number;
  message: string;
}
