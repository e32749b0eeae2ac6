#!/usr/bin/env node

/**
 * Concord MCP Server: stdio transport.
 *
 * Exposes 3 tools: discuss, list_roles, discussion_status.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, getUserDataDir, getCheckpointDir } from "./config.js";
import { createGenerator } from "./adapters/index.js";
import { FileCheckpointStore } from "./store/file.js";
import { createLogger, initFileLogging } from "./logger.js";
import { errorMessage } from "./errors.js";
import { handleDiscuss, handleListRoles, handleStatus, type HandlerContext } from "./handlers.js";
import {
  DiscussInputSchema,
  ListRolesInputSchema,
  DiscussionStatusInputSchema,
  TOOL_DEFINITIONS,
} from "./tools.js";

const log = createLogger("server");

const config = loadConfig();
initFileLogging(getUserDataDir(config), config.logging);

const ctx: HandlerContext = {
  config,
  generator: createGenerator(config.generator),
  store: new FileCheckpointStore(getCheckpointDir(config)),
};

const server = new McpServer({
  name: "concord",
  version: "0.1.0",
});

function describe(name: (typeof TOOL_DEFINITIONS)[number]["name"]): string {
  return TOOL_DEFINITIONS.find((t) => t.name === name)?.description ?? name;
}

function text(s: string) {
  return { content: [{ type: "text" as const, text: s }] };
}

function failure(tool: string, err: unknown) {
  const message = errorMessage(err);
  log.error(`${tool} failed:`, message);
  return { content: [{ type: "text" as const, text: `Error: ${message}` }], isError: true };
}

// --- Tool handlers ---

server.tool("discuss", describe("discuss"), DiscussInputSchema.shape, async (args) => {
  try {
    return text(await handleDiscuss(ctx, args));
  } catch (err) {
    return failure("discuss", err);
  }
});

server.tool("list_roles", describe("list_roles"), ListRolesInputSchema.shape, async () => {
  return text(handleListRoles(ctx));
});

server.tool("discussion_status", describe("discussion_status"), DiscussionStatusInputSchema.shape, async (args) => {
  try {
    return text(await handleStatus(ctx, args.session_id));
  } catch (err) {
    return failure("discussion_status", err);
  }
});

// --- Start ---

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Concord MCP server running on stdio");
}

main().catch((err) => {
  log.error("Fatal:", errorMessage(err));
  process.exit(1);
});
