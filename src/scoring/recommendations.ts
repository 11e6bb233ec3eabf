import type { CompanyProfile } from "../types";

export type RecommendationCategory = "past_wins" | "capabilities" | "preferences";
export type RecommendationPriority = "high" | "medium" | "low";

/** A suggested profile change with its estimated effect on match scores (percent points). */
export interface Recommendation {
  category: RecommendationCategory;
  priority: RecommendationPriority;
  currentScore: number;
  potentialScore: number;
  action: string;
  impact: string;
  specificActions: string[];
}

const PRIORITY_ORDER: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 };

// Capability wording that embeds too close to every notice to discriminate.
const GENERIC_TERMS = new Set(["it", "software", "services", "solutions", "general", "consulting"]);

function isGeneric(text: string): boolean {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .some((w) => GENERIC_TERMS.has(w));
}

function pastWinAdvice(count: number): Recommendation | undefined {
  if (count === 0)
    return {
      category: "past_wins",
      priority: "high",
      currentScore: 0,
      potentialScore: 30,
      action: "Add 1-2 similar past contract wins to demonstrate relevant experience",
      impact: "+30% to total match score",
      specificActions: [
        "Add a past win in your main capability area",
        "Include contract value and buyer organisation name",
        "Focus on government and public sector contracts",
      ],
    };
  if (count < 3)
    return {
      category: "past_wins",
      priority: "medium",
      currentScore: count * 10,
      potentialScore: 30,
      action: `Add ${3 - count} more past wins to strengthen your track record`,
      impact: `+${(3 - count) * 10}% potential boost`,
      specificActions: [
        "Add wins from different public sector buyers",
        "Include recent contracts (last 2-3 years)",
        "Aim for at least 3 past wins",
      ],
    };
  return undefined;
}

function capabilityAdvice(profile: CompanyProfile): Recommendation | undefined {
  const count = profile.capabilities.length;
  if (count < 3)
    return {
      category: "capabilities",
      priority: count < 2 ? "high" : "medium",
      currentScore: count * 10,
      potentialScore: 40,
      action: `Add ${Math.max(3 - count, 1)} domain-specific capabilities`,
      impact: `+${Math.min(15, (3 - count) * 5)}% potential boost`,
      specificActions: [
        "Use specific terminology such as 'Fleet Management Systems' rather than 'IT Services'",
        "Name the delivery area, e.g. 'Cloud Infrastructure Migration'",
        "Match the language of notices you are interested in",
      ],
    };
  if (count < 5) {
    const generic = profile.capabilities.filter((c) => isGeneric(c.text)).length;
    if (generic > count / 2)
      return {
        category: "capabilities",
        priority: "medium",
        currentScore: count * 8,
        potentialScore: 40,
        action: "Make capabilities more specific to improve semantic matching",
        impact: "+10-15% better relevance scores",
        specificActions: [
          "Replace 'IT Services' with e.g. 'Cybersecurity Auditing & Compliance'",
          "Replace 'Software Development' with the service standard you deliver to",
          "Reuse exact phrases from your top-scoring notices",
        ],
      };
  }
  return undefined;
}

function preferenceAdvice(profile: CompanyProfile): Recommendation | undefined {
  const prefs = profile.preferences;
  if (!prefs)
    return {
      category: "preferences",
      priority: "low",
      currentScore: 0,
      potentialScore: 30,
      action: "Set search preferences to filter and focus results",
      impact: "+30% better targeted results",
      specificActions: [
        "Set minimum/maximum contract values",
        "Add preferred regions (e.g. London, South East)",
        "Add keywords for your specialisation",
      ],
    };

  const missing: string[] = [];
  let impact = 0;
  if (!prefs.minValue && !prefs.maxValue) {
    missing.push("contract value range");
    impact += 8;
  }
  if (!prefs.preferredRegions?.length) {
    missing.push("preferred regions");
    impact += 10;
  }
  if (!prefs.keywords?.length) {
    missing.push("target keywords");
    impact += 7;
  }
  if (missing.length === 0) return undefined;
  return {
    category: "preferences",
    priority: "low",
    currentScore: 30 - impact,
    potentialScore: 30,
    action: `Complete your search preferences: ${missing.join(", ")}`,
    impact: `+${impact}% optimisation`,
    specificActions: missing.map((m) => `Add ${m}`),
  };
}

/**
 * Actionable suggestions for raising a profile's match scores, most urgent
 * first.
 */
export function recommendImprovements(profile: CompanyProfile): Recommendation[] {
  const out = [
    pastWinAdvice(profile.pastWins.length),
    capabilityAdvice(profile),
    preferenceAdvice(profile),
  ].filter((r): r is Recommendation => r !== undefined);
  return out.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
