import type { NetworkStats, Granularity } from './NetworkStats.js';
import type { SourceStats } from './SourceStats.js';

/**
 * Score delta contributed by one matching rule
 */
export interface ScoreContribution {
    /** Identifier of the rule that matched */
    rule: string;
    /** Stable reason string, part of the report contract */
    reason: string;
    score: number;
    /** Human-readable measurement behind the match, e.g. `15,000 requests` */
    detail: string;
}

/**
 * Risk assessment of a single source address
 */
export interface RiskAssessment {
    address: string;
    riskScore: number;
    /** Reasons of the matching rules, in rule order */
    reasons: string[];
    contributions: ScoreContribution[];
    readonly stats: SourceStats;
}

/**
 * Risk assessment of a network block
 */
export interface NetworkRiskAssessment {
    key: string;
    granularity: Granularity;
    cidr: string;
    riskScore: number;
    reasons: string[];
    contributions: ScoreContribution[];
    readonly stats: NetworkStats;
}

/**
 * Population percentiles a run's sources are compared against
 */
export interface PercentileBaseline {
    /** Number of sources the percentiles were computed over */
    population: number;
    requests: PercentileSet;
    bytes: PercentileSet;
}

export interface PercentileSet {
    p75: number;
    p90: number;
    p99: number;
}
