/**
 * Firestore document schemas. Documents are validated on every read so a
 * malformed record fails loudly at the storage boundary.
 */

import { z } from "zod";
import { SESSION_STATUSES } from "../lifecycle/engine.js";

const Index = z.number().int().min(0);
const AtLeastOne = z.number().int().min(1);

export const PositionSchema = z.object({
  groupIndex: Index,
  groupRepeat: Index,
  entryIndex: Index,
  entryRepeat: Index,
  stitchOrdinal: Index,
});

export const WorkSessionDocSchema = z.object({
  userId: z.string().min(1),
  patternId: z.string().min(1),
  position: PositionSchema,
  status: z.enum(SESSION_STATUSES),
  startedAt: z.string(),
  lastActivityAt: z.string(),
  completedAt: z.string().nullable().default(null),
  version: Index.default(0),
});

const StitchEntrySchema = z.object({
  stitchId: z.string().min(1),
  count: AtLeastOne,
  repeatCount: AtLeastOne.default(1),
  intoStitch: z.string().max(200).optional(),
});

const InstructionGroupSchema = z.object({
  id: z.string().min(1),
  label: z.string().max(200).default(""),
  repeatCount: AtLeastOne.default(1),
  entries: z.array(StitchEntrySchema).default([]),
  notes: z.string().optional(),
});

const PatternStitchSchema = z.object({
  id: z.string().min(1),
  abbreviation: z.string().max(20),
  name: z.string().max(100),
});

export const PatternDocSchema = z.object({
  userId: z.string().min(1),
  name: z.string().max(200),
  groups: z.array(InstructionGroupSchema).default([]),
  stitches: z.array(PatternStitchSchema).default([]),
});

export function parseDocument<T extends z.ZodTypeAny>(schema: T, path: string, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Malformed document ${path}: ${problems.join("; ")}`);
  }
  return result.data;
}
