import { RoleConfigSchema, type RoleConfig, type RoleConfigInput, type Config } from "./config.js";
import { contentTerms } from "./consensus/text.js";

/**
 * Built-in roles for discussions.
 * Each role has a description plus responsibilities, expertise and
 * characteristics that go into its prompt; expertise also drives topic-based
 * selection and optional consensus weighting.
 */
const BUILTIN_ROLE_INPUTS: readonly RoleConfigInput[] = [
  {
    id: "moderator",
    name: "Moderator",
    description: "Keeps the discussion focused, summarizes positions and steers participants toward a shared conclusion.",
    responsibilities: [
      "Summarize where participants agree and disagree",
      "Propose wording that several participants can accept",
      "Keep contributions on topic",
    ],
    expertise: ["facilitation", "negotiation", "conflict resolution"],
    characteristics: ["neutral", "concise", "constructive"],
  },
  {
    id: "engineer",
    name: "Software Engineer",
    description: "Evaluates proposals for technical feasibility, implementation effort and maintenance cost.",
    responsibilities: [
      "Estimate implementation effort",
      "Point out technical constraints",
      "Suggest simpler alternatives",
    ],
    expertise: ["software", "architecture", "performance", "scalability", "testing"],
    characteristics: ["pragmatic", "detail oriented"],
  },
  {
    id: "security",
    name: "Security Specialist",
    description: "Analyzes proposals for vulnerabilities, data exposure and compliance risks.",
    responsibilities: [
      "Identify attack surfaces",
      "Flag shortcuts that compromise security",
      "Recommend mitigations",
    ],
    expertise: ["security", "privacy", "compliance", "encryption", "risk"],
    characteristics: ["skeptical", "thorough"],
  },
  {
    id: "product",
    name: "Product Manager",
    description: "Represents user needs and business goals, and balances scope against time to market.",
    responsibilities: [
      "Clarify who benefits and how",
      "Prioritize features by value",
      "Define what success looks like",
    ],
    expertise: ["users", "roadmap", "prioritization", "market", "cost"],
    characteristics: ["outcome focused", "communicative"],
  },
  {
    id: "economist",
    name: "Economist",
    description: "Assesses costs, incentives and long-term economic effects of each option.",
    responsibilities: [
      "Compare costs and benefits",
      "Identify incentives and trade-offs",
    ],
    expertise: ["economics", "cost", "funding", "investment", "markets"],
    characteristics: ["quantitative", "measured"],
  },
  {
    id: "ethicist",
    name: "Ethicist",
    description: "Examines fairness, consent and the interests of people affected by a decision.",
    responsibilities: [
      "Surface affected groups",
      "Question assumptions about consent and fairness",
    ],
    expertise: ["ethics", "fairness", "privacy", "transparency", "community"],
    characteristics: ["principled", "empathetic"],
  },
  {
    id: "critic",
    name: "Devil's Advocate",
    description: "Finds flaws, edge cases and hidden assumptions in proposals; challenges claims that lack evidence.",
    responsibilities: [
      "Challenge weak arguments",
      "Identify failure modes",
    ],
    expertise: ["risk", "analysis", "evaluation"],
    characteristics: ["critical", "constructive"],
  },
];

export const BUILTIN_ROLES: readonly RoleConfig[] = BUILTIN_ROLE_INPUTS.map((r) => parseRole(r));

/** Parse a role from loosely-typed input (string-or-list fields become lists). */
export function parseRole(input: unknown): RoleConfig {
  return RoleConfigSchema.parse(input);
}

/**
 * Look up a role by id. Checks custom config first, then built-ins.
 */
export function getRole(id: string, config?: Config): RoleConfig | undefined {
  const custom = config?.roles.find((r) => r.id === id);
  if (custom) return custom;
  return BUILTIN_ROLES.find((r) => r.id === id);
}

/**
 * Resolve role ids to descriptors.
 * Unknown ids get a generic role so the discussion can still run.
 */
export function resolveRoles(ids: string[], config?: Config): RoleConfig[] {
  return ids.map((id) => getRole(id, config) ?? {
    id,
    name: id,
    description: `Contributes the perspective of a ${id}.`,
    responsibilities: [],
    expertise: [],
    characteristics: [],
    examples: [],
  });
}

export function listRoles(config?: Config): RoleConfig[] {
  const all = new Map<string, RoleConfig>();
  for (const r of BUILTIN_ROLES) all.set(r.id, r);
  if (config) {
    for (const r of config.roles) all.set(r.id, r);
  }
  return [...all.values()];
}

/** Number of a role's expertise entries that share a term with the topic. */
export function expertiseMatches(role: RoleConfig, topic: string): number {
  const topicSet = contentTerms(topic);
  return role.expertise.filter((entry) => {
    for (const term of contentTerms(entry)) {
      if (topicSet.has(term)) return true;
    }
    return false;
  }).length;
}

/**
 * Pick the n roles whose expertise best matches the topic.
 * Ties keep catalogue order; the moderator is always included when n >= 3.
 */
export function selectRolesForTopic(topic: string, n: number, config?: Config): RoleConfig[] {
  const catalogue = listRoles(config);
  const scored = catalogue.map((role, index) => ({ role, index, score: expertiseMatches(role, topic) }));
  const moderator = scored.find((s) => s.role.id === "moderator");
  const pool = n >= 3 && moderator ? scored.filter((s) => s !== moderator) : scored;
  pool.sort((a, b) => b.score - a.score || a.index - b.index);
  const picked = pool.slice(0, n >= 3 && moderator ? n - 1 : n).map((s) => s.role);
  return n >= 3 && moderator ? [moderator.role, ...picked] : picked;
}

/**
 * Consensus weight per role: 1 + 0.5 per expertise entry matching the topic,
 * counting at most two matches (so weights range 1.0 to 2.0).
 */
export function computeExpertiseWeights(roles: RoleConfig[], topic: string): Map<string, number> {
  const weights = new Map<string, number>();
  for (const role of roles) {
    weights.set(role.id, 1 + 0.5 * Math.min(expertiseMatches(role, topic), 2));
  }
  return weights;
}

/**
 * Role description for the turn prompt:
 *   You are a {name}. {description}
 *   Key Responsibilities / Areas of Expertise / Key Characteristics
 */
export function buildRoleDescription(role: RoleConfig): string {
  const lines = [`You are a ${role.name}.`];
  if (role.description) lines.push(`Role Description: ${role.description}`);

  const section = (title: string, items: string[]) => {
    if (items.length === 0) return;
    lines.push("", `${title}:`, ...items.map((i) => `- ${i}`));
  };
  section("Key Responsibilities", role.responsibilities);
  section("Areas of Expertise", role.expertise);
  section("Key Characteristics", role.characteristics);
  section("Example Contributions", role.examples);

  return lines.join("\n");
}
