import type {
  Capability,
  CompanyProfile,
  Contract,
  MatchResult,
  PastWin,
  ScoreOutcome,
  SearchPreferences,
} from "../types";
import { formatGbp, formatPercent } from "./format";
import { cosineSimilarity } from "./similarity";

export interface ScoreWeights {
  capability: number;
  pastWin: number;
  preference: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = {
  capability: 0.4,
  pastWin: 0.3,
  preference: 0.3,
};

export interface MatchScorerOptions {
  weights?: Partial<ScoreWeights>;
  /** How many of the best capability similarities are averaged (default 3). */
  topCapabilities?: number;
  verbose?: boolean;
}

export interface PastWinScore {
  score: number;
  reasons: string[];
}

export interface PreferenceScore {
  score: number;
  passesFilters: boolean;
  reasons: string[];
  /** Why a hard filter failed; empty when `passesFilters`. */
  exclusions: string[];
}

export type ExcludedContract = Extract<ScoreOutcome, { status: "excluded" }>;

export interface RankedContracts {
  /** Best first. */
  scored: MatchResult[];
  /** In input order. */
  excluded: ExcludedContract[];
}

const EXACT_BUYER_POINTS = 0.6;
const PARTIAL_BUYER_POINTS = 0.4;
const VALUE_POINTS = 0.3;
const VALUE_RATIO_MATCH = 0.5;
const VALUE_RATIO_SIMILAR = 0.8;
const REGION_BOOST = 0.2;
const REGION_PENALTY = 0.6;
const KEYWORD_POINTS = 0.15;

function positive(v: number | null | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v) && v > 0;
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function contractText(contract: Contract): string {
  return `${contract.title} ${contract.description ?? ""}`.toLowerCase();
}

/**
 * Scores a procurement notice against a company profile from three parts:
 * capability similarity, past-win affinity and search preferences. Hard
 * preference filters exclude a notice outright instead of lowering its
 * score.
 *
 * Embeddings must already be attached to the contract and capabilities;
 * the scorer does no I/O and keeps no state between calls, so batches can be
 * scored in any order.
 */
export class MatchScorer {
  private readonly weights: ScoreWeights;
  private readonly topCapabilities: number;
  private readonly verbose: boolean;

  public constructor(opts: MatchScorerOptions = {}) {
    this.weights = { ...DEFAULT_WEIGHTS, ...opts.weights };
    this.topCapabilities = Math.max(1, Math.floor(opts.topCapabilities ?? 3));
    this.verbose = !!opts.verbose;
  }

  /** Score one notice, or report why it was excluded. */
  public evaluate(contract: Contract, profile: CompanyProfile): ScoreOutcome {
    const preference = this.preferenceScore(contract, profile.preferences);
    if (!preference.passesFilters) {
      if (this.verbose)
        console.error(
          `[Scorer] ${contract.noticeId} excluded for ${profile.firmId}: ${preference.exclusions.join("; ")}`,
        );
      return { status: "excluded", noticeId: contract.noticeId, reasons: preference.exclusions };
    }

    const reasons: string[] = [];
    const capabilityScore = this.capabilityScore(contract, profile.capabilities);
    if (capabilityScore > 0.6) reasons.push(`Strong capability match (${formatPercent(capabilityScore)})`);
    else if (capabilityScore > 0.4) reasons.push(`Good capability match (${formatPercent(capabilityScore)})`);
    else if (capabilityScore > 0.25)
      reasons.push(`Moderate capability match (${formatPercent(capabilityScore)})`);

    const pastWin = this.pastWinScore(contract, profile.pastWins);
    reasons.push(...pastWin.reasons, ...preference.reasons);

    const totalScore = clamp01(
      capabilityScore * this.weights.capability +
        pastWin.score * this.weights.pastWin +
        preference.score * this.weights.preference,
    );
    if (this.verbose)
      console.error(
        `[Scorer] ${contract.noticeId} scored ${formatPercent(totalScore)} for ${profile.firmId}`,
      );

    return {
      status: "scored",
      result: {
        noticeId: contract.noticeId,
        capabilityScore,
        pastWinScore: pastWin.score,
        preferenceScore: preference.score,
        totalScore,
        matchReasons: reasons,
        passesFilters: true,
      },
    };
  }

  /** @returns The match, or `null` when a hard filter excludes the notice. */
  public score(contract: Contract, profile: CompanyProfile): MatchResult | null {
    const outcome = this.evaluate(contract, profile);
    return outcome.status === "scored" ? outcome.result : null;
  }

  /** Score every notice independently and order the survivors best first. */
  public rank(contracts: readonly Contract[], profile: CompanyProfile): RankedContracts {
    const scored: MatchResult[] = [];
    const excluded: ExcludedContract[] = [];
    for (const contract of contracts) {
      const outcome = this.evaluate(contract, profile);
      if (outcome.status === "scored") scored.push(outcome.result);
      else excluded.push(outcome);
    }
    scored.sort((a, b) => b.totalScore - a.totalScore || a.noticeId.localeCompare(b.noticeId));
    return { scored, excluded };
  }

  /**
   * Mean of the best `topCapabilities` cosine similarities between the
   * notice and the capabilities that have an embedding. Missing embeddings
   * on either side give 0.
   */
  public capabilityScore(contract: Contract, capabilities: readonly Capability[]): number {
    const target = contract.embedding;
    if (!target || target.length === 0) return 0;

    const similarities: number[] = [];
    for (const cap of capabilities) {
      if (!cap.embedding || cap.embedding.length === 0) continue;
      similarities.push(cosineSimilarity(target, cap.embedding));
    }
    if (similarities.length === 0) return 0;

    similarities.sort((a, b) => b - a);
    const top = similarities.slice(0, this.topCapabilities);
    return clamp01(top.reduce((n, s) => n + s, 0) / top.length);
  }

  /** Buyer and contract-value affinity with the firm's past wins, capped at 1. */
  public pastWinScore(contract: Contract, pastWins: readonly PastWin[]): PastWinScore {
    let score = 0;
    const reasons: string[] = [];
    const buyer = contract.buyerName?.trim().toLowerCase() ?? "";

    for (const win of pastWins) {
      const winBuyer = win.buyerName.trim().toLowerCase();
      if (buyer && winBuyer) {
        if (winBuyer === buyer) {
          score += EXACT_BUYER_POINTS;
          reasons.push(`Previously won contract with ${win.buyerName}`);
        } else if (buyer.includes(winBuyer) || winBuyer.includes(buyer)) {
          // renamed or abbreviated organisations
          score += PARTIAL_BUYER_POINTS;
          reasons.push(`Previously worked with similar buyer (${win.buyerName})`);
        }
      }

      if (positive(contract.value) && positive(win.value)) {
        const ratio = Math.min(contract.value, win.value) / Math.max(contract.value, win.value);
        if (ratio > VALUE_RATIO_MATCH) {
          score += VALUE_POINTS;
          if (ratio > VALUE_RATIO_SIMILAR)
            reasons.push(`Similar contract value to past win (${formatGbp(win.value)})`);
        }
      }
    }

    return { score: Math.min(score, 1), reasons };
  }

  /**
   * Hard filters (value bounds, excluded categories) decide exclusion; the
   * soft rules (region, keywords) only run for notices that pass.
   *
   * A preferred region adds 0.2; any other region multiplies the score by
   * 0.6.
   */
  public preferenceScore(
    contract: Contract,
    prefs: SearchPreferences | null | undefined,
  ): PreferenceScore {
    if (!prefs) return { score: 1, passesFilters: true, reasons: [], exclusions: [] };

    const exclusions: string[] = [];
    const reasons: string[] = [];
    const text = contractText(contract);

    if (positive(contract.value)) {
      if (positive(prefs.minValue) && contract.value < prefs.minValue)
        exclusions.push(
          `Contract value ${formatGbp(contract.value)} below minimum ${formatGbp(prefs.minValue)}`,
        );
      if (positive(prefs.maxValue) && contract.value > prefs.maxValue)
        exclusions.push(
          `Contract value ${formatGbp(contract.value)} above maximum ${formatGbp(prefs.maxValue)}`,
        );
    }

    const excluded = (prefs.excludedCategories ?? [])
      .map((c) => c.trim())
      .find((c) => c.length > 0 && text.includes(c.toLowerCase()));
    if (excluded !== undefined) exclusions.push(`Contains excluded category: ${excluded}`);

    if (exclusions.length > 0) return { score: 0, passesFilters: false, reasons, exclusions };

    if (positive(contract.value) && (positive(prefs.minValue) || positive(prefs.maxValue)))
      reasons.push(`Contract value (${formatGbp(contract.value)}) matches preferences`);

    let score = 1;
    const region = contract.region?.trim();
    const preferred = prefs.preferredRegions ?? [];
    if (preferred.length > 0 && region) {
      const wanted = region.toLowerCase();
      if (preferred.some((r) => r.trim().toLowerCase() === wanted)) {
        score += REGION_BOOST;
        reasons.push(`Located in preferred region (${region})`);
      } else {
        score *= REGION_PENALTY;
      }
    }

    const matched = (prefs.keywords ?? []).filter((kw) => {
      const k = kw.trim().toLowerCase();
      return k.length > 0 && text.includes(k);
    });
    if (matched.length > 0) {
      score += matched.length * KEYWORD_POINTS;
      reasons.push(`Matches keywords: ${matched.slice(0, 3).join(", ")}`);
    }

    return { score: Math.min(score, 1), passesFilters: true, reasons, exclusions };
  }
}

const defaultScorer = new MatchScorer();

/** Score with default weights; `null` signals a hard-filter exclusion. */
export function scoreContract(contract: Contract, profile: CompanyProfile): MatchResult | null {
  return defaultScorer.score(contract, profile);
}

export function evaluateContract(contract: Contract, profile: CompanyProfile): ScoreOutcome {
  return defaultScorer.evaluate(contract, profile);
}
