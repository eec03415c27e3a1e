import type { SourceStats } from '../types/SourceStats.js';
import {
    getActiveHours,
    getPeakHourlyRequests,
    getRequestsPerHour,
} from '../stats/sourceStats.js';
import { MIB, formatCount, formatMiB, formatPercent } from './format.js';
import type { SourceRule } from './types.js';

/**
 * Number of distinct user agents containing one of the automation patterns
 * (case-insensitive substring match)
 */
export function countAutomationAgents(stats: SourceStats, patterns: readonly string[]): number {
    let matches = 0;
    for (const userAgent of stats.userAgents) {
        const normalized = userAgent.toLowerCase();
        if (patterns.some(pattern => normalized.includes(pattern))) {
            matches++;
        }
    }
    return matches;
}

function errorShare(stats: SourceStats, errorStatusCodes: readonly number[]): number {
    const errors = errorStatusCodes.reduce((sum, status) => sum + (stats.statusCodes.get(status) ?? 0), 0);
    return errors / Math.max(1, stats.requestCount);
}

function pathDiversity(stats: SourceStats): number {
    return stats.paths.size / Math.max(1, stats.requestCount);
}

function peakShare(stats: SourceStats): number {
    return getPeakHourlyRequests(stats) / Math.max(1, stats.requestCount);
}

/**
 * Per-source rules in evaluation order
 */
export const SOURCE_RULES: readonly SourceRule[] = [
    {
        id: 'high-request-volume',
        reason: 'high request volume',
        applies: (stats, { config }) => stats.requestCount > config.sourceThresholds.highTotalRequests,
        weight: () => 30,
        detail: stats => `${formatCount(stats.requestCount)} requests`,
    },
    {
        id: 'extreme-request-volume',
        reason: 'extreme request volume (>P99)',
        applies: (stats, { baseline }) => baseline.population > 0 && stats.requestCount > baseline.requests.p99,
        weight: () => 40,
        detail: (stats, { baseline }) => `${formatCount(stats.requestCount)} requests, P99 ${formatCount(baseline.requests.p99)}`,
    },
    {
        id: 'high-hourly-rate',
        reason: 'high hourly rate',
        applies: (stats, { config }) => getRequestsPerHour(stats) > config.sourceThresholds.highRequestRatePerHour,
        weight: () => 25,
        detail: stats => `${formatCount(getRequestsPerHour(stats))} requests/hour`,
    },
    {
        id: 'hourly-spike',
        reason: 'hourly spike',
        applies: (stats, { config }) => getPeakHourlyRequests(stats) > config.sourceThresholds.highPeakHourlyRequests,
        weight: () => 35,
        detail: stats => `${formatCount(getPeakHourlyRequests(stats))} requests in peak hour`,
    },
    {
        id: 'high-traffic-volume',
        reason: 'high traffic volume',
        applies: (stats, { config }) => stats.totalBytes > config.sourceThresholds.highTrafficMiB * MIB,
        weight: () => 20,
        detail: stats => formatMiB(stats.totalBytes),
    },
    {
        id: 'extreme-traffic-volume',
        reason: 'extreme traffic volume (>P99)',
        applies: (stats, { baseline }) => baseline.population > 0 && stats.totalBytes > baseline.bytes.p99,
        weight: () => 35,
        detail: (stats, { baseline }) => `${formatMiB(stats.totalBytes)}, P99 ${formatMiB(baseline.bytes.p99)}`,
    },
    {
        id: 'low-path-diversity',
        reason: 'low path diversity',
        applies: (stats, { config }) =>
            stats.requestCount > config.sourceThresholds.lowPathDiversityMinRequests &&
            pathDiversity(stats) < config.sourceThresholds.lowPathDiversityRatio,
        weight: () => 15,
        detail: stats => `${stats.paths.size} distinct paths, ratio ${pathDiversity(stats).toFixed(3)}`,
    },
    {
        id: 'suspicious-user-agents',
        reason: 'suspicious user agents',
        applies: (stats, { config }) => countAutomationAgents(stats, config.automationPatterns) > 0,
        weight: (stats, { config }) => 10 + 5 * countAutomationAgents(stats, config.automationPatterns),
        detail: (stats, { config }) => `${countAutomationAgents(stats, config.automationPatterns)} automation user agents`,
    },
    {
        id: 'time-concentrated',
        reason: 'time-concentrated',
        applies: (stats, { config }) =>
            getActiveHours(stats) > 1 && peakShare(stats) > config.sourceThresholds.concentrationRatio,
        weight: () => 20,
        detail: stats => `${formatPercent(peakShare(stats))} of requests in peak hour`,
    },
    {
        id: 'narrow-active-window',
        reason: 'narrow active window',
        applies: (stats, { config }) =>
            stats.requestCount > config.sourceThresholds.narrowWindowMinRequests &&
            getActiveHours(stats) <= config.sourceThresholds.narrowWindowMaxActiveHours,
        weight: () => 25,
        detail: stats => `active in ${getActiveHours(stats)} hour buckets`,
    },
    {
        id: 'high-error-rate',
        reason: 'high error rate',
        applies: (stats, { config }) =>
            errorShare(stats, config.sourceThresholds.errorStatusCodes) > config.sourceThresholds.errorRate,
        weight: () => 15,
        detail: (stats, { config }) => `${formatPercent(errorShare(stats, config.sourceThresholds.errorStatusCodes))} error responses`,
    },
];
