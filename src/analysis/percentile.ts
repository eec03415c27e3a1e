import type { PercentileBaseline, PercentileSet } from './types/RiskAssessment.js';
import type { SourceStats } from './types/SourceStats.js';

/**
 * Linear-interpolation percentile.
 *
 * Values are sorted ascending and the percentile sits at rank
 * `p / 100 * (n - 1)`; a fractional rank interpolates between its two
 * neighbours as `lower + (upper - lower) * fraction`. Matches the default
 * method of most numeric libraries. Returns 0 for an empty population.
 */
export function percentile(values: readonly number[], p: number): number {
    if (values.length === 0) {
        return 0;
    }
    if (p < 0 || p > 100) {
        throw new RangeError(`Percentile must be between 0 and 100, got ${p}`);
    }

    const sorted = [...values].sort((a, b) => a - b);
    const rank = (p / 100) * (sorted.length - 1);
    const lowerIndex = Math.floor(rank);
    const upperIndex = Math.ceil(rank);
    const lower = sorted[lowerIndex];
    const upper = sorted[upperIndex];

    return lower + (upper - lower) * (rank - lowerIndex);
}

function percentileSet(values: readonly number[]): PercentileSet {
    return {
        p75: percentile(values, 75),
        p90: percentile(values, 90),
        p99: percentile(values, 99),
    };
}

/**
 * P75/P90/P99 of request counts and byte totals across all sources
 */
export function computeBaseline(sources: Iterable<SourceStats>): PercentileBaseline {
    const requestCounts: number[] = [];
    const byteTotals: number[] = [];

    for (const stats of sources) {
        requestCounts.push(stats.requestCount);
        byteTotals.push(stats.totalBytes);
    }

    return {
        population: requestCounts.length,
        requests: percentileSet(requestCounts),
        bytes: percentileSet(byteTotals),
    };
}
