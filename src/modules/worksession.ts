/**
 * Work Session Module: tool handlers for live pattern tracking.
 * Collection: work_sessions (via WorkSessionService)
 */

import { z, ZodError } from "zod";
import { isWorkSessionError } from "../errors.js";
import { describeStitch } from "../navigation/progress.js";
import type { WorkSessionService } from "../services/workSessionService.js";
import type { AuthContext, Pattern, ProgressReport, WorkSession } from "../types/index.js";

const StartSessionSchema = z.object({
  patternId: z.string().min(1).max(100),
});

const SessionRefSchema = z.object({
  sessionId: z.string().min(1).max(100),
});

const ListSessionsSchema = z.object({
  state: z.enum(["active", "completed"]).default("active"),
  limit: z.number().int().min(1).max(50).default(10),
  offset: z.number().int().min(0).default(0),
});

export type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

export interface ToolContext {
  auth: AuthContext;
  sessions: WorkSessionService;
}

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data) }] };
}

/** Rejected operations become a result; anything unexpected propagates. */
function failureResult(error: unknown): ToolResult {
  if (isWorkSessionError(error)) {
    return jsonResult({ success: false, kind: error.kind, error: error.message });
  }
  if (error instanceof ZodError) {
    const problems = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return jsonResult({ success: false, kind: "invalid_input", error: problems.join("; ") });
  }
  throw error;
}

function positionMessage(progress: ProgressReport): string {
  const stitch = describeStitch(progress.current) || "?";
  const repeat = progress.groupRepeatInfo ? ` (${progress.groupRepeatInfo})` : "";
  return `${progress.groupLabel}${repeat}: ${stitch}, ${progress.completedStitches}/${progress.totalStitches} stitches`;
}

/** Session, fresh progress report, and a one-line summary (defaults to the position). */
function sessionView(ctx: ToolContext, session: WorkSession, pattern: Pattern, message?: string) {
  const progress = ctx.sessions.progress(session, pattern);
  return { success: true, session, progress, message: message ?? positionMessage(progress) };
}

export async function startWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = StartSessionSchema.parse(rawArgs);
    const session = await ctx.sessions.start(ctx.auth.userId, args.patternId);
    const { pattern } = await ctx.sessions.loadForUser(ctx.auth.userId, session.id);
    return jsonResult(sessionView(ctx, session, pattern, `Session started: "${pattern.name}"`));
  } catch (error) {
    return failureResult(error);
  }
}

export async function getWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    const { session, pattern } = await ctx.sessions.loadForUser(ctx.auth.userId, args.sessionId);
    return jsonResult(sessionView(ctx, session, pattern));
  } catch (error) {
    return failureResult(error);
  }
}

export async function advanceWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    const loaded = await ctx.sessions.loadForUser(ctx.auth.userId, args.sessionId);
    const { session, completed } = await ctx.sessions.advance(loaded.session, loaded.pattern);
    const message = completed ? `Pattern complete: "${loaded.pattern.name}"` : undefined;
    return jsonResult({ ...sessionView(ctx, session, loaded.pattern, message), completed });
  } catch (error) {
    return failureResult(error);
  }
}

export async function retreatWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    const loaded = await ctx.sessions.loadForUser(ctx.auth.userId, args.sessionId);
    const session = await ctx.sessions.retreat(loaded.session, loaded.pattern);
    return jsonResult(sessionView(ctx, session, loaded.pattern));
  } catch (error) {
    return failureResult(error);
  }
}

export async function pauseWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    const loaded = await ctx.sessions.loadForUser(ctx.auth.userId, args.sessionId);
    const session = await ctx.sessions.pause(loaded.session);
    return jsonResult(sessionView(ctx, session, loaded.pattern, "Session paused"));
  } catch (error) {
    return failureResult(error);
  }
}

export async function resumeWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    const loaded = await ctx.sessions.loadForUser(ctx.auth.userId, args.sessionId);
    const session = await ctx.sessions.resume(loaded.session);
    return jsonResult(sessionView(ctx, session, loaded.pattern, "Session resumed"));
  } catch (error) {
    return failureResult(error);
  }
}

export async function abandonWorkSessionHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = SessionRefSchema.parse(rawArgs);
    await ctx.sessions.getForUser(ctx.auth.userId, args.sessionId);
    await ctx.sessions.abandon(args.sessionId);
    return jsonResult({ success: true, sessionId: args.sessionId, message: "Session abandoned" });
  } catch (error) {
    return failureResult(error);
  }
}

export async function listWorkSessionsHandler(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult> {
  try {
    const args = ListSessionsSchema.parse(rawArgs ?? {});
    const { userId } = ctx.auth;

    if (args.state === "active") {
      const sessions = await ctx.sessions.listActiveByUser(userId);
      return jsonResult({ success: true, state: args.state, sessions, count: sessions.length });
    }

    const [sessions, total] = await Promise.all([
      ctx.sessions.listCompletedByUser(userId, args.limit, args.offset),
      ctx.sessions.countCompletedByUser(userId),
    ]);
    return jsonResult({
      success: true,
      state: args.state,
      sessions,
      count: sessions.length,
      total,
      hasMore: args.offset + sessions.length < total,
    });
  } catch (error) {
    return failureResult(error);
  }
}
