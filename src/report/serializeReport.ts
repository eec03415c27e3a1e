import type { AnalysisReport } from '../analysis/types/Report.js';
import type { NetworkStats } from '../analysis/types/NetworkStats.js';
import type { NetworkRiskAssessment, RiskAssessment } from '../analysis/types/RiskAssessment.js';
import type { SourceStats } from '../analysis/types/SourceStats.js';
import {
    getActiveHours,
    getPeakHourlyRequests,
    getRequestsPerHour,
} from '../analysis/stats/sourceStats.js';

/**
 * JSON form of SourceStats: sets become sorted arrays, histograms plain
 * objects and timestamps ISO strings
 */
export interface SerializedSourceStats {
    address: string;
    requestCount: number;
    totalBytes: number;
    paths: string[];
    userAgents: string[];
    domains: string[];
    statusCodes: Record<string, number>;
    hourlyRequests: Record<string, number>;
    firstSeen: string | null;
    lastSeen: string | null;
    requestsPerHour: number;
    peakHourlyRequests: number;
    activeHours: number;
}

export interface SerializedNetworkStats {
    key: string;
    granularity: string;
    cidr: string;
    members: string[];
    memberCount: number;
    totalRequests: number;
    totalBytes: number;
}

export type SerializedRiskAssessment = Omit<RiskAssessment, 'stats'> & { stats: SerializedSourceStats };

export type SerializedNetworkRiskAssessment = Omit<NetworkRiskAssessment, 'stats'> & {
    stats: SerializedNetworkStats;
};

export type SerializedReport = Omit<
    AnalysisReport,
    | 'generatedAt'
    | 'suspiciousSources'
    | 'suspiciousNetworks'
    | 'topSourcesByRequests'
    | 'topSourcesByBytes'
    | 'topNetworks'
    | 'snapshot'
> & {
    generatedAt: string;
    suspiciousSources: SerializedRiskAssessment[];
    suspiciousNetworks: SerializedNetworkRiskAssessment[];
    topSourcesByRequests: SerializedSourceStats[];
    topSourcesByBytes: SerializedSourceStats[];
    topNetworks: SerializedNetworkStats[];
    snapshot?: {
        sources: Record<string, SerializedSourceStats>;
        networks: Record<string, SerializedNetworkStats>;
    };
};

const sorted = (values: Iterable<string>): string[] => [...values].sort();

const toIso = (epoch: number | null): string | null => (epoch === null ? null : new Date(epoch).toISOString());

function histogram<K extends string | number>(values: ReadonlyMap<K, number>): Record<string, number> {
    const entries = [...values].map(([key, count]): [string, number] => [String(key), count]);
    return Object.fromEntries(entries.sort(([a], [b]) => a.localeCompare(b, 'en', { numeric: true })));
}

export function serializeSourceStats(stats: SourceStats): SerializedSourceStats {
    return {
        address: stats.address,
        requestCount: stats.requestCount,
        totalBytes: stats.totalBytes,
        paths: sorted(stats.paths),
        userAgents: sorted(stats.userAgents),
        domains: sorted(stats.domains),
        statusCodes: histogram(stats.statusCodes),
        hourlyRequests: histogram(stats.hourlyRequests),
        firstSeen: toIso(stats.firstSeen),
        lastSeen: toIso(stats.lastSeen),
        requestsPerHour: getRequestsPerHour(stats),
        peakHourlyRequests: getPeakHourlyRequests(stats),
        activeHours: getActiveHours(stats),
    };
}

export function serializeNetworkStats(stats: NetworkStats): SerializedNetworkStats {
    return {
        key: stats.key,
        granularity: stats.granularity,
        cidr: stats.cidr,
        members: sorted(stats.members),
        memberCount: stats.memberCount,
        totalRequests: stats.totalRequests,
        totalBytes: stats.totalBytes,
    };
}

export function serializeRiskAssessment(assessment: RiskAssessment): SerializedRiskAssessment {
    return { ...assessment, stats: serializeSourceStats(assessment.stats) };
}

export function serializeNetworkRiskAssessment(assessment: NetworkRiskAssessment): SerializedNetworkRiskAssessment {
    return { ...assessment, stats: serializeNetworkStats(assessment.stats) };
}

/**
 * Convert a report into plain JSON data. The full snapshot can be large, so
 * it is only included on request.
 */
export function serializeReport(report: AnalysisReport, { includeSnapshot = false } = {}): SerializedReport {
    const serialized: SerializedReport = {
        runId: report.runId,
        origin: report.origin,
        generatedAt: new Date(report.generatedAt).toISOString(),
        config: report.config,
        ingestion: report.ingestion,
        summary: report.summary,
        timePatterns: report.timePatterns,
        baseline: report.baseline,
        suspiciousSources: report.suspiciousSources.map(serializeRiskAssessment),
        suspiciousNetworks: report.suspiciousNetworks.map(serializeNetworkRiskAssessment),
        blockPlan: report.blockPlan,
        topSourcesByRequests: report.topSourcesByRequests.map(serializeSourceStats),
        topSourcesByBytes: report.topSourcesByBytes.map(serializeSourceStats),
        topNetworks: report.topNetworks.map(serializeNetworkStats),
    };

    if (includeSnapshot) {
        serialized.snapshot = {
            sources: Object.fromEntries(
                [...report.snapshot.sources].map(([address, stats]) => [address, serializeSourceStats(stats)])
            ),
            networks: Object.fromEntries(
                [...report.snapshot.networks].map(([key, stats]) => [key, serializeNetworkStats(stats)])
            ),
        };
    }

    return serialized;
}
