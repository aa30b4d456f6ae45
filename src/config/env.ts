/**
 * Server configuration, read once from the environment at startup.
 */

import { z } from "zod";

const EnvSchema = z.object({
  FIREBASE_PROJECT_ID: z.string().min(1).default("stitch-tracker"),
  STITCH_USER_ID: z.string({ required_error: "STITCH_USER_ID is required" }).min(1, "STITCH_USER_ID must not be empty"),
});

export interface ServerConfig {
  projectId: string;
  /** The user every tool call acts for */
  userId: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join("\n")}`);
  }

  return {
    projectId: result.data.FIREBASE_PROJECT_ID,
    userId: result.data.STITCH_USER_ID,
  };
}
