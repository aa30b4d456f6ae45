/**
 * Progress report: derived for display, never persisted.
 */

/** What to show in a current/previous/next stitch slot */
export type StitchDisplay =
  | { kind: "stitch"; stitchId: string; abbreviation: string; name: string }
  /** The stitch table has no entry for this id */
  | { kind: "unresolved"; stitchId: string }
  /** Nothing before the first stitch */
  | { kind: "none" }
  /** The pattern is finished (or would be, one step on) */
  | { kind: "end" };

export type GroupStatus = "not-started" | "in-progress" | "completed";

export interface GroupProgress {
  label: string;
  repeatCount: number;
  /** 1-based for the current group; repeatCount once completed; 0 before */
  currentRepeat: number;
  status: GroupStatus;
  completedInGroup: number;
  totalInGroup: number;
}

export interface ProgressReport {
  completedStitches: number;
  totalStitches: number;
  percentage: number;
  groupId: string;
  groupLabel: string;
  /** e.g. "repeat 2 of 4"; empty for groups worked once */
  groupRepeatInfo: string;
  current: StitchDisplay;
  previous: StitchDisplay;
  next: StitchDisplay;
  groups: GroupProgress[];
}
