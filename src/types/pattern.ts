/**
 * Read-only pattern structure supplied by the pattern provider.
 *
 * A pattern is an ordered list of groups; each group an ordered list of
 * stitch entries. Entries point into the pattern's own stitch table.
 */

/** One stitch instruction inside a group, e.g. "sc 6" repeated twice */
export interface StitchEntry {
  stitchId: string;
  /** Stitches produced per repeat (>= 1) */
  count: number;
  /** How many times the entry itself repeats (>= 1) */
  repeatCount: number;
  intoStitch?: string;
}

export interface InstructionGroup {
  id: string;
  label: string;
  repeatCount: number;
  entries: StitchEntry[];
  notes?: string;
}

/** Pattern-local stitch definition */
export interface PatternStitch {
  id: string;
  abbreviation: string;
  name: string;
}

/** Stored at patterns/{id} */
export interface Pattern {
  id: string;
  userId: string;
  name: string;
  groups: InstructionGroup[];
  stitches: PatternStitch[];
}
