import type { AnalysisConfig } from '../types/Configuration.js';
import type { NetworkStats } from '../types/NetworkStats.js';
import type { PercentileBaseline, ScoreContribution } from '../types/RiskAssessment.js';
import type { SourceStats } from '../types/SourceStats.js';

/**
 * One independent scoring rule. Rules never see each other's results;
 * every rule in a list is evaluated and the deltas of the matching ones are
 * summed in list order.
 */
export interface ScoringRule<TStats, TContext> {
    id: string;
    /** Reason string reported when the rule matches */
    reason: string;
    applies(stats: TStats, context: TContext): boolean;
    weight(stats: TStats, context: TContext): number;
    detail(stats: TStats, context: TContext): string;
}

export interface SourceRuleContext {
    baseline: PercentileBaseline;
    config: AnalysisConfig;
}

export interface NetworkRuleContext {
    config: AnalysisConfig;
}

export type SourceRule = ScoringRule<SourceStats, SourceRuleContext>;
export type NetworkRule = ScoringRule<NetworkStats, NetworkRuleContext>;

/**
 * Evaluate every rule against one entity
 */
export function evaluateRules<TStats, TContext>(
    rules: readonly ScoringRule<TStats, TContext>[],
    stats: TStats,
    context: TContext
): { score: number; contributions: ScoreContribution[] } {
    let score = 0;
    const contributions: ScoreContribution[] = [];

    for (const rule of rules) {
        if (!rule.applies(stats, context)) {
            continue;
        }

        const delta = rule.weight(stats, context);
        score += delta;
        contributions.push({
            rule: rule.id,
            reason: rule.reason,
            score: delta,
            detail: rule.detail(stats, context),
        });
    }

    return { score, contributions };
}
