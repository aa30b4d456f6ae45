#!/usr/bin/env node

/**
 * Stitch Tracker MCP Server entry point.
 * Tool registration, Firestore wiring, stdio transport.
 *
 * stdout belongs to the transport: diagnostics go to stderr.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config/env.js";
import { initializeFirebase } from "./firebase/client.js";
import { WorkSessionService } from "./services/workSessionService.js";
import { FirestorePatternProvider } from "./store/firestorePatternProvider.js";
import { FirestoreSessionStore } from "./store/firestoreSessionStore.js";
import { TOOL_DEFINITIONS, TOOL_HANDLERS } from "./tools.js";
import type { ToolContext } from "./modules/worksession.js";

async function main() {
  const config = loadConfig();
  initializeFirebase(config.projectId);

  const ctx: ToolContext = {
    auth: { userId: config.userId },
    sessions: new WorkSessionService(new FirestoreSessionStore(), new FirestorePatternProvider()),
  };

  const server = new Server(
    { name: "stitch-tracker-mcp", version: "1.0.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const handler = TOOL_HANDLERS[name];
    if (!handler) {
      return { content: [{ type: "text", text: `Error: Unknown tool "${name}"` }], isError: true };
    }

    const startTime = Date.now();
    try {
      const result = await handler(ctx, args ?? {});
      console.error(`[StitchTracker] ${name} ok in ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      console.error(`[StitchTracker] ${name} failed:`, error);
      const message = error instanceof Error ? error.message : String(error);
      return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
    }
  });

  await server.connect(new StdioServerTransport());
  console.error(`[StitchTracker] Serving ${TOOL_DEFINITIONS.length} tools over stdio for user ${config.userId}`);
}

main().catch((error) => {
  console.error("[StitchTracker] Fatal:", error);
  process.exit(1);
});
