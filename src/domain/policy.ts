export const DEFAULT_DECK_SIZE = 20 as const;
export const EXAM_DURATION_MIN = 30 as const;
export const PASS_PERCENT = 70 as const;
export const FAILED_COOLDOWN_DAYS = 3 as const;

/** Seconds left at which a timed session gets a warning */
export const WARN_THRESHOLDS = [300, 60] as const;
export type WarnThreshold = (typeof WARN_THRESHOLDS)[number];

export type Mode = "exam" | "practice";
export type Verdict = "known" | "missed";
