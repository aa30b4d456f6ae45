/**
 * Stitch Tracker Type System. Re-exports
 *
 * Import from here: `import type { WorkSession, Pattern } from '../types/index.js'`
 */

export type {
  StitchEntry,
  InstructionGroup,
  PatternStitch,
  Pattern,
} from "./pattern.js";

export type { Position, WorkSession, NewWorkSession } from "./session.js";

export type { PatternProvider, SessionStore, StitchLookup } from "./store.js";

export type {
  StitchDisplay,
  GroupStatus,
  GroupProgress,
  ProgressReport,
} from "./progress.js";

export type { AuthContext } from "./auth.js";

// Re-export lifecycle types
export type { SessionStatus } from "../lifecycle/engine.js";
export {
  validateTransition,
  transition,
  TRANSITIONS,
} from "../lifecycle/engine.js";
