/**
 * Progress Calculator — pure view of where a session stands in its pattern.
 * Never mutates the session; neighbours are found by stepping a copy.
 */

import {
  advance,
  entryAt,
  groupStitchCount,
  isValidPosition,
  retreat,
  stitchesBeforeInGroup,
  stitchRank,
  totalStitchCount,
} from "./position.js";
import type {
  GroupProgress,
  InstructionGroup,
  Pattern,
  PatternStitch,
  Position,
  ProgressReport,
  StitchDisplay,
  StitchLookup,
  WorkSession,
} from "../types/index.js";

const NONE: StitchDisplay = { kind: "none" };
const END: StitchDisplay = { kind: "end" };

export function buildStitchLookup(stitches: readonly PatternStitch[]): StitchLookup {
  const byId = new Map(stitches.map((stitch) => [stitch.id, stitch]));
  return (stitchId) => byId.get(stitchId);
}

function displayAt(pattern: Pattern, position: Position, lookup: StitchLookup): StitchDisplay {
  const entry = entryAt(pattern, position);
  if (!entry) return NONE;
  const stitch = lookup(entry.stitchId);
  if (!stitch) return { kind: "unresolved", stitchId: entry.stitchId };
  return { kind: "stitch", stitchId: entry.stitchId, abbreviation: stitch.abbreviation, name: stitch.name };
}

export function formatGroupRepeat(groupRepeat: number, repeatCount: number): string {
  return repeatCount > 1 ? `repeat ${groupRepeat + 1} of ${repeatCount}` : "";
}

/** Short text for a stitch slot, as shown on the tracker. */
export function describeStitch(display: StitchDisplay): string {
  switch (display.kind) {
    case "stitch":
      return display.abbreviation;
    case "unresolved":
      return `? (${display.stitchId})`;
    case "none":
      return "";
    case "end":
      return "finished";
  }
}

function groupBreakdown(
  pattern: Pattern,
  position: Position,
  finished: boolean,
): GroupProgress[] {
  return pattern.groups.map((group, index): GroupProgress => {
    const totalInGroup = groupStitchCount(group) * group.repeatCount;
    const base = { label: group.label, repeatCount: group.repeatCount, totalInGroup };

    if (finished || index < position.groupIndex) {
      return { ...base, status: "completed", currentRepeat: group.repeatCount, completedInGroup: totalInGroup };
    }
    if (index === position.groupIndex) {
      return {
        ...base,
        status: "in-progress",
        currentRepeat: position.groupRepeat + 1,
        completedInGroup: Math.min(stitchesBeforeInGroup(group, position), totalInGroup),
      };
    }
    return { ...base, status: "not-started", currentRepeat: 0, completedInGroup: 0 };
  });
}

export function computeProgress(
  session: WorkSession,
  pattern: Pattern,
  lookup: StitchLookup,
): ProgressReport {
  const { position } = session;
  const finished = session.status === "completed";
  const totalStitches = totalStitchCount(pattern);
  // A pattern edited after the session started can leave the position past its end.
  const completedStitches = finished ? totalStitches : Math.min(stitchRank(position, pattern), totalStitches);
  const percentage = totalStitches === 0 ? 0 : (completedStitches / totalStitches) * 100;

  const group: InstructionGroup | undefined = pattern.groups[position.groupIndex];
  const report: ProgressReport = {
    completedStitches,
    totalStitches,
    percentage,
    groupId: group?.id ?? "",
    groupLabel: group?.label ?? "",
    groupRepeatInfo: group ? formatGroupRepeat(position.groupRepeat, group.repeatCount) : "",
    current: NONE,
    previous: NONE,
    next: NONE,
    groups: groupBreakdown(pattern, position, finished),
  };

  if (!isValidPosition(position, pattern)) return report;

  if (finished) {
    // Position rests on the last stitch, which has been worked.
    return { ...report, current: END, previous: displayAt(pattern, position, lookup), next: END };
  }

  const back = retreat(position, pattern);
  const forward = advance(position, pattern);
  return {
    ...report,
    current: displayAt(pattern, position, lookup),
    previous: back.moved ? displayAt(pattern, back.position, lookup) : NONE,
    next: forward.completed ? END : displayAt(pattern, forward.position, lookup),
  };
}
