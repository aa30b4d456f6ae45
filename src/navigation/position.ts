/**
 * Position Counter — steps a session through the flattened pattern.
 *
 * The five position fields form an odometer with mixed radices:
 *   stitchOrdinal < entry.count
 *   entryRepeat   < entry.repeatCount
 *   entryIndex    < group.entries.length
 *   groupRepeat   < group.repeatCount
 *   groupIndex    < groups.length
 * Advance carries into the next level out, retreat borrows from it.
 * Groups without stitches are stepped over in both directions.
 */

import { InvalidInputError } from "../errors.js";
import type { InstructionGroup, Pattern, Position, StitchEntry } from "../types/index.js";

export interface AdvanceResult {
  position: Position;
  /** True when the input was the last stitch; `position` is then the input unchanged */
  completed: boolean;
}

export interface RetreatResult {
  position: Position;
  /** False at the first stitch of the pattern (no-op) */
  moved: boolean;
}

export const ZERO_POSITION: Readonly<Position> = Object.freeze({
  groupIndex: 0,
  groupRepeat: 0,
  entryIndex: 0,
  entryRepeat: 0,
  stitchOrdinal: 0,
});

// --- Counting ---

/** Stitches in one repeat of a group */
export function groupStitchCount(group: InstructionGroup): number {
  return group.entries.reduce((sum, entry) => sum + entry.count * entry.repeatCount, 0);
}

export function totalStitchCount(pattern: Pattern): number {
  return pattern.groups.reduce((sum, group) => sum + groupStitchCount(group) * group.repeatCount, 0);
}

/** Stitches of `group` worked before `position`, assuming the position is inside it. */
export function stitchesBeforeInGroup(group: InstructionGroup, position: Position): number {
  let done = groupStitchCount(group) * position.groupRepeat;
  group.entries.forEach((entry, index) => {
    if (index < position.entryIndex) {
      done += entry.count * entry.repeatCount;
    } else if (index === position.entryIndex) {
      done += entry.count * position.entryRepeat + position.stitchOrdinal;
    }
  });
  return done;
}

/**
 * Linear rank of a position: the number of stitches strictly before it in
 * the canonical (groupIndex, groupRepeat, entryIndex, entryRepeat, stitchOrdinal) order.
 */
export function stitchRank(position: Position, pattern: Pattern): number {
  let rank = 0;
  pattern.groups.forEach((group, index) => {
    if (index < position.groupIndex) {
      rank += groupStitchCount(group) * group.repeatCount;
    } else if (index === position.groupIndex) {
      rank += stitchesBeforeInGroup(group, position);
    }
  });
  return rank;
}

/** Lexicographic comparison; negative when `a` comes first. */
export function comparePositions(a: Position, b: Position): number {
  return (
    a.groupIndex - b.groupIndex ||
    a.groupRepeat - b.groupRepeat ||
    a.entryIndex - b.entryIndex ||
    a.entryRepeat - b.entryRepeat ||
    a.stitchOrdinal - b.stitchOrdinal
  );
}

// --- Bounds ---

function hasStitches(group: InstructionGroup): boolean {
  return groupStitchCount(group) > 0;
}

function nextGroupWithStitches(pattern: Pattern, from: number): number {
  for (let index = from; index < pattern.groups.length; index++) {
    if (hasStitches(pattern.groups[index])) return index;
  }
  return -1;
}

function previousGroupWithStitches(pattern: Pattern, from: number): number {
  for (let index = from; index >= 0; index--) {
    if (hasStitches(pattern.groups[index])) return index;
  }
  return -1;
}

/** The entry addressed by a position, or undefined when it is out of range. */
export function entryAt(pattern: Pattern, position: Position): StitchEntry | undefined {
  if (!isValidPosition(position, pattern)) return undefined;
  return pattern.groups[position.groupIndex].entries[position.entryIndex];
}

function inRange(value: number, limit: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < limit;
}

export function isValidPosition(position: Position, pattern: Pattern): boolean {
  if (!inRange(position.groupIndex, pattern.groups.length)) return false;
  const group = pattern.groups[position.groupIndex];
  if (!inRange(position.groupRepeat, group.repeatCount)) return false;
  if (!inRange(position.entryIndex, group.entries.length)) return false;
  const entry = group.entries[position.entryIndex];
  return inRange(position.entryRepeat, entry.repeatCount) && inRange(position.stitchOrdinal, entry.count);
}

function requireEntry(pattern: Pattern, position: Position): { group: InstructionGroup; entry: StitchEntry } {
  if (!isValidPosition(position, pattern)) {
    throw new InvalidInputError(
      `Position ${formatPosition(position)} is outside pattern ${pattern.id}`,
    );
  }
  const group = pattern.groups[position.groupIndex];
  return { group, entry: group.entries[position.entryIndex] };
}

export function formatPosition(position: Position): string {
  const { groupIndex, groupRepeat, entryIndex, entryRepeat, stitchOrdinal } = position;
  return `(${groupIndex}, ${groupRepeat}, ${entryIndex}, ${entryRepeat}, ${stitchOrdinal})`;
}

/** First stitch of the first group with stitches; null for a pattern with none. */
export function firstPosition(pattern: Pattern): Position | null {
  const groupIndex = nextGroupWithStitches(pattern, 0);
  if (groupIndex === -1) return null;
  return { ...ZERO_POSITION, groupIndex };
}

/** Last stitch of the last group with stitches; null for a pattern with none. */
export function lastPosition(pattern: Pattern): Position | null {
  const groupIndex = previousGroupWithStitches(pattern, pattern.groups.length - 1);
  if (groupIndex === -1) return null;
  return lastStitchOfGroup(pattern.groups[groupIndex], groupIndex);
}

function lastStitchOfGroup(group: InstructionGroup, groupIndex: number): Position {
  const entryIndex = group.entries.length - 1;
  return lastStitchOfEntry({ groupIndex, groupRepeat: group.repeatCount - 1 }, group, entryIndex);
}

function lastStitchOfEntry(
  outer: Pick<Position, "groupIndex" | "groupRepeat">,
  group: InstructionGroup,
  entryIndex: number,
): Position {
  const entry = group.entries[entryIndex];
  return {
    ...outer,
    entryIndex,
    entryRepeat: entry.repeatCount - 1,
    stitchOrdinal: entry.count - 1,
  };
}

// --- Stepping ---

/**
 * Move one stitch forward. Throws InvalidInputError if `position` does not
 * address a stitch of `pattern`.
 */
export function advance(position: Position, pattern: Pattern): AdvanceResult {
  const { group, entry } = requireEntry(pattern, position);
  const next: Position = { ...position };

  next.stitchOrdinal++;
  if (next.stitchOrdinal < entry.count) return { position: next, completed: false };

  next.stitchOrdinal = 0;
  next.entryRepeat++;
  if (next.entryRepeat < entry.repeatCount) return { position: next, completed: false };

  next.entryRepeat = 0;
  next.entryIndex++;
  if (next.entryIndex < group.entries.length) return { position: next, completed: false };

  next.entryIndex = 0;
  next.groupRepeat++;
  if (next.groupRepeat < group.repeatCount) return { position: next, completed: false };

  const groupIndex = nextGroupWithStitches(pattern, position.groupIndex + 1);
  if (groupIndex === -1) {
    // Exhausted: the caller decides what completion means.
    return { position: { ...position }, completed: true };
  }
  return { position: { ...ZERO_POSITION, groupIndex }, completed: false };
}

/**
 * Move one stitch back. At the first stitch this is a no-op.
 * Throws InvalidInputError if `position` does not address a stitch of `pattern`.
 */
export function retreat(position: Position, pattern: Pattern): RetreatResult {
  const { group, entry } = requireEntry(pattern, position);

  if (position.stitchOrdinal > 0) {
    return { position: { ...position, stitchOrdinal: position.stitchOrdinal - 1 }, moved: true };
  }

  if (position.entryRepeat > 0) {
    return {
      position: { ...position, entryRepeat: position.entryRepeat - 1, stitchOrdinal: entry.count - 1 },
      moved: true,
    };
  }

  if (position.entryIndex > 0) {
    return { position: lastStitchOfEntry(position, group, position.entryIndex - 1), moved: true };
  }

  if (position.groupRepeat > 0) {
    const outer = { groupIndex: position.groupIndex, groupRepeat: position.groupRepeat - 1 };
    return { position: lastStitchOfEntry(outer, group, group.entries.length - 1), moved: true };
  }

  const groupIndex = previousGroupWithStitches(pattern, position.groupIndex - 1);
  if (groupIndex === -1) {
    return { position: { ...position }, moved: false };
  }
  return { position: lastStitchOfGroup(pattern.groups[groupIndex], groupIndex), moved: true };
}
