import type { AnalysisConfig } from './types/Configuration.js';
import { DEFAULT_ANALYSIS_CONFIG } from './types/Configuration.js';
import type { NetworkStats } from './types/NetworkStats.js';
import type { StatsSnapshot } from './types/Report.js';
import type {
    NetworkRiskAssessment,
    PercentileBaseline,
    RiskAssessment,
} from './types/RiskAssessment.js';
import type { SourceStats } from './types/SourceStats.js';
import { computeBaseline } from './percentile.js';
import { evaluateRules, type NetworkRule, type SourceRule } from './rules/types.js';
import { SOURCE_RULES } from './rules/sourceRules.js';
import { NETWORK_RULES } from './rules/networkRules.js';

export interface RiskScorerRules {
    source?: readonly SourceRule[];
    network?: readonly NetworkRule[];
}

export interface ScoringResult {
    baseline: PercentileBaseline;
    /** Suspicious sources, highest score first */
    suspiciousSources: RiskAssessment[];
    /** Suspicious networks, highest score first */
    suspiciousNetworks: NetworkRiskAssessment[];
}

/**
 * Scores sources and networks of a completed snapshot against independent
 * heuristic rules.
 *
 * Deltas are summed in rule order and ties keep snapshot iteration order, so
 * the same snapshot always yields the same ranking.
 */
export class RiskScorer {
    private readonly config: AnalysisConfig;
    private readonly sourceRules: readonly SourceRule[];
    private readonly networkRules: readonly NetworkRule[];

    constructor(config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG, rules: RiskScorerRules = {}) {
        this.config = config;
        this.sourceRules = rules.source ?? SOURCE_RULES;
        this.networkRules = rules.network ?? NETWORK_RULES;
    }

    /**
     * Score a whole snapshot
     */
    score(snapshot: StatsSnapshot): ScoringResult {
        const baseline = computeBaseline(snapshot.sources.values());
        return {
            baseline,
            suspiciousSources: this.scoreSources(snapshot.sources.values(), baseline),
            suspiciousNetworks: this.scoreNetworks(snapshot.networks.values()),
        };
    }

    /**
     * Assess one source against the baseline, whether or not it is suspicious
     */
    assessSource(stats: SourceStats, baseline: PercentileBaseline): RiskAssessment {
        const { score, contributions } = evaluateRules(this.sourceRules, stats, { baseline, config: this.config });
        return {
            address: stats.address,
            riskScore: score,
            reasons: contributions.map(contribution => contribution.reason),
            contributions,
            stats,
        };
    }

    isSuspiciousSource(assessment: RiskAssessment): boolean {
        const { suspiciousScore, minReasons } = this.config.classification;
        return assessment.riskScore >= suspiciousScore || assessment.reasons.length >= minReasons;
    }

    /**
     * Suspicious sources ranked by score, descending
     */
    scoreSources(sources: Iterable<SourceStats>, baseline: PercentileBaseline): RiskAssessment[] {
        const suspicious: RiskAssessment[] = [];
        for (const stats of sources) {
            const assessment = this.assessSource(stats, baseline);
            if (this.isSuspiciousSource(assessment)) {
                suspicious.push(assessment);
            }
        }
        return suspicious.sort((a, b) => b.riskScore - a.riskScore);
    }

    assessNetwork(stats: NetworkStats): NetworkRiskAssessment {
        const { score, contributions } = evaluateRules(this.networkRules, stats, { config: this.config });
        return {
            key: stats.key,
            granularity: stats.granularity,
            cidr: stats.cidr,
            riskScore: score,
            reasons: contributions.map(contribution => contribution.reason),
            contributions,
            stats,
        };
    }

    isSuspiciousNetwork(assessment: NetworkRiskAssessment): boolean {
        return assessment.riskScore >= this.config.classification.suspiciousNetworkScore;
    }

    /**
     * Suspicious networks ranked by score, descending
     */
    scoreNetworks(networks: Iterable<NetworkStats>): NetworkRiskAssessment[] {
        const suspicious: NetworkRiskAssessment[] = [];
        for (const stats of networks) {
            const assessment = this.assessNetwork(stats);
            if (this.isSuspiciousNetwork(assessment)) {
                suspicious.push(assessment);
            }
        }
        return suspicious.sort((a, b) => b.riskScore - a.riskScore);
    }
}
