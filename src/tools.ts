/**
 * Tool Registry: maps tool names to handlers + JSON schema definitions.
 * 8 tools, all in the work session module.
 */

import {
  startWorkSessionHandler,
  getWorkSessionHandler,
  advanceWorkSessionHandler,
  retreatWorkSessionHandler,
  pauseWorkSessionHandler,
  resumeWorkSessionHandler,
  abandonWorkSessionHandler,
  listWorkSessionsHandler,
  type ToolContext,
  type ToolResult,
} from "./modules/worksession.js";

type Handler = (ctx: ToolContext, args: unknown) => Promise<ToolResult>;

export const TOOL_HANDLERS: Record<string, Handler> = {
  // Lifecycle
  start_work_session: startWorkSessionHandler,
  pause_work_session: pauseWorkSessionHandler,
  resume_work_session: resumeWorkSessionHandler,
  abandon_work_session: abandonWorkSessionHandler,
  // Navigation
  advance_work_session: advanceWorkSessionHandler,
  retreat_work_session: retreatWorkSessionHandler,
  // Queries
  get_work_session: getWorkSessionHandler,
  list_work_sessions: listWorkSessionsHandler,
};

const sessionIdSchema = {
  type: "object" as const,
  properties: {
    sessionId: { type: "string", maxLength: 100 },
  },
  required: ["sessionId"],
};

export const TOOL_DEFINITIONS = [
  // === Lifecycle ===
  {
    name: "start_work_session",
    description: "Start tracking progress through one of your patterns, positioned on its first stitch",
    inputSchema: {
      type: "object" as const,
      properties: {
        patternId: { type: "string", maxLength: 100 },
      },
      required: ["patternId"],
    },
  },
  {
    name: "pause_work_session",
    description: "Pause an active work session. Navigation is rejected until it is resumed.",
    inputSchema: sessionIdSchema,
  },
  {
    name: "resume_work_session",
    description: "Resume a paused work session at the stitch where it was paused",
    inputSchema: sessionIdSchema,
  },
  {
    name: "abandon_work_session",
    description: "Permanently delete a work session, whatever its status",
    inputSchema: sessionIdSchema,
  },
  // === Navigation ===
  {
    name: "advance_work_session",
    description: "Mark the current stitch as worked and move to the next one. Completes the session after the last stitch.",
    inputSchema: sessionIdSchema,
  },
  {
    name: "retreat_work_session",
    description: "Step back one stitch. Does nothing on the first stitch of the pattern.",
    inputSchema: sessionIdSchema,
  },
  // === Queries ===
  {
    name: "get_work_session",
    description: "Get a work session with its progress report (current, previous and next stitch, per-group status)",
    inputSchema: sessionIdSchema,
  },
  {
    name: "list_work_sessions",
    description: "List your in-progress (active and paused) or completed work sessions",
    inputSchema: {
      type: "object" as const,
      properties: {
        state: { type: "string", enum: ["active", "completed"], default: "active" },
        limit: { type: "number", minimum: 1, maximum: 50, default: 10, description: "Page size for completed sessions" },
        offset: { type: "number", minimum: 0, default: 0, description: "Completed sessions to skip" },
      },
    },
  },
];
