/**
 * MCP tool definitions (Zod schemas).
 *
 * Tools exposed by the Concord MCP server:
 * - discuss            run (or resume) a discussion
 * - list_roles         built-in and configured roles
 * - discussion_status  stored sessions, or one session in detail
 */

import { z } from "zod";

export const DiscussInputSchema = z.object({
  topic: z.string().min(1).describe("The question or topic to discuss"),
  roles: z
    .array(z.string())
    .optional()
    .describe("Role ids in speaking order (default: selected from the topic)"),
  num_roles: z
    .number()
    .int()
    .min(2)
    .max(8)
    .default(3)
    .describe("Number of roles to select when `roles` is omitted"),
  session_id: z
    .string()
    .optional()
    .describe("Resume an existing session by ID. Continues from its last checkpoint."),
  max_turns: z
    .number()
    .int()
    .min(1)
    .max(200)
    .optional()
    .describe("Turn limit for the session (default: from config)"),
  window_size: z.number().int().min(1).optional().describe("Messages kept verbatim in context"),
  threshold: z.number().min(0).max(1).optional().describe("Agreement ratio required for consensus"),
  max_tokens: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Token budget for this session (0 = unlimited, overrides config)"),
  estimate_only: z
    .boolean()
    .default(false)
    .describe("Return a token usage estimate without running the discussion"),
});

export const ListRolesInputSchema = z.object({});

export const DiscussionStatusInputSchema = z.object({
  session_id: z.string().optional().describe("Session to inspect (default: list all sessions)"),
});

export type DiscussInput = z.infer<typeof DiscussInputSchema>;

export const TOOL_DEFINITIONS = [
  { name: "discuss", description: "Run a multi-role discussion until consensus or the turn limit", schema: DiscussInputSchema },
  { name: "list_roles", description: "List available roles", schema: ListRolesInputSchema },
  { name: "discussion_status", description: "Show stored discussion sessions", schema: DiscussionStatusInputSchema },
] as const;
