import { describe, it, expect } from "vitest";
import {
  BUILTIN_ROLES,
  getRole,
  resolveRoles,
  listRoles,
  selectRolesForTopic,
  computeExpertiseWeights,
  buildRoleDescription,
  parseRole,
} from "../roles.js";
import { ConfigSchema } from "../config.js";

const config = ConfigSchema.parse({
  roles: [
    { id: "auditor", name: "Auditor", description: "Checks the numbers.", expertise: "accounting" },
    { id: "critic", name: "Custom Critic" },
  ],
});

const PRIVACY_TOPIC = "How should we protect customer privacy in our payment system?";

describe("getRole", () => {
  it("returns built-in role by id", () => {
    expect(getRole("engineer")?.name).toBe("Software Engineer");
  });

  it("returns undefined for unknown id without config", () => {
    expect(getRole("nonexistent")).toBeUndefined();
  });

  it("prefers configured roles over built-ins", () => {
    expect(getRole("critic", config)?.name).toBe("Custom Critic");
    expect(getRole("auditor", config)?.expertise).toEqual(["accounting"]);
  });
});

describe("resolveRoles", () => {
  it("keeps order and gives unknown ids a generic role", () => {
    const roles = resolveRoles(["security", "historian"]);
    expect(roles.map((r) => r.id)).toEqual(["security", "historian"]);
    expect(roles[1]).toEqual({
      id: "historian",
      name: "historian",
      description: "Contributes the perspective of a historian.",
      responsibilities: [],
      expertise: [],
      characteristics: [],
      examples: [],
    });
  });
});

describe("listRoles", () => {
  it("merges configured roles into the catalogue", () => {
    const ids = listRoles(config).map((r) => r.id);
    expect(ids).toHaveLength(BUILTIN_ROLES.length + 1);
    expect(ids[ids.length - 1]).toBe("auditor");
    expect(listRoles(config).find((r) => r.id === "critic")?.name).toBe("Custom Critic");
  });
});

describe("selectRolesForTopic", () => {
  it("puts the moderator first and ranks the rest by expertise", () => {
    // security: security + privacy; product: users; ethicist: privacy (later in catalogue)
    expect(selectRolesForTopic(PRIVACY_TOPIC, 3).map((r) => r.id)).toEqual(["moderator", "security", "product"]);
  });

  it("leaves the moderator out for two roles", () => {
    expect(selectRolesForTopic(PRIVACY_TOPIC, 2).map((r) => r.id)).toEqual(["security", "product"]);
  });

  it("falls back to catalogue order without matches", () => {
    expect(selectRolesForTopic("Tabs or spaces?", 3).map((r) => r.id)).toEqual(["moderator", "engineer", "security"]);
  });
});

describe("computeExpertiseWeights", () => {
  it("adds half a point per match, at most two", () => {
    const weights = computeExpertiseWeights(resolveRoles(["moderator", "security", "product"]), PRIVACY_TOPIC);
    expect([...weights.entries()]).toEqual([
      ["moderator", 1],
      ["security", 2],
      ["product", 1.5],
    ]);
  });
});

describe("buildRoleDescription", () => {
  it("renders the role sections", () => {
    const critic = getRole("critic");
    expect(critic && buildRoleDescription(critic)).toBe([
      "You are a Devil's Advocate.",
      "Role Description: Finds flaws, edge cases and hidden assumptions in proposals; challenges claims that lack evidence.",
      "",
      "Key Responsibilities:",
      "- Challenge weak arguments",
      "- Identify failure modes",
      "",
      "Areas of Expertise:",
      "- risk",
      "- analysis",
      "- evaluation",
      "",
      "Key Characteristics:",
      "- critical",
      "- constructive",
    ].join("\n"));
  });

  it("includes examples and skips empty sections", () => {
    const role = parseRole({ id: "scribe", name: "Scribe", examples: "Let me restate the proposal." });
    expect(buildRoleDescription(role)).toBe(
      "You are a Scribe.\n\nExample Contributions:\n- Let me restate the proposal.",
    );
  });
});
