import type { AddressFamily } from './NetworkStats.js';

/**
 * Thresholds for the per-source rules
 */
export interface SourceThresholds {
    /** Total requests above which a source is high volume */
    highTotalRequests: number;
    /** Requests per hour of active span above which a source is flagged */
    highRequestRatePerHour: number;
    /** Requests within a single hour bucket above which a source is flagged */
    highPeakHourlyRequests: number;
    /** Total traffic in MiB above which a source is flagged */
    highTrafficMiB: number;
    /** Minimum requests before path diversity is considered */
    lowPathDiversityMinRequests: number;
    /** Distinct paths per request below which a source is flagged */
    lowPathDiversityRatio: number;
    /** Share of requests in the busiest hour bucket above which a source is flagged */
    concentrationRatio: number;
    /** Minimum requests before a narrow active window is considered */
    narrowWindowMinRequests: number;
    /** Active hour buckets at or below which the window is narrow */
    narrowWindowMaxActiveHours: number;
    /** Error share above which a source is flagged */
    errorRate: number;
    /** Status codes counted as errors */
    errorStatusCodes: number[];
}

/**
 * Thresholds for the per-network rules
 */
export interface NetworkThresholds {
    manyMembers: number;
    severalMembers: number;
    highAverageRequests: number;
    highTrafficGiB: number;
    coordinatedMinMembers: number;
    coordinatedAverageRequests: number;
}

/**
 * Tiering and list caps for block plans
 */
export interface BlockPlanConfig {
    /** Minimum score of the high tier */
    highRiskScore: number;
    /** Minimum score of the medium tier */
    mediumRiskScore: number;
    immediateBlockLimit: number;
    monitorLimit: number;
    /** High-tier sources one suggestion block must hold, per family */
    networkMinSources: Record<AddressFamily, number>;
}

/**
 * Main configuration of the edge traffic analysis
 */
export interface AnalysisConfig {
    sourceThresholds: SourceThresholds;
    networkThresholds: NetworkThresholds;
    classification: {
        /** Score at which a source is suspicious */
        suspiciousScore: number;
        /** Reason count at which a source is suspicious regardless of score */
        minReasons: number;
        /** Score at which a network is suspicious */
        suspiciousNetworkScore: number;
    };
    blockPlan: BlockPlanConfig;
    /** Lower-case substrings identifying automation user agents */
    automationPatterns: string[];
    report: {
        topSources: number;
        topNetworks: number;
    };
}

/**
 * Default configuration values
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    sourceThresholds: {
        highTotalRequests: 10_000,
        highRequestRatePerHour: 3_000,
        highPeakHourlyRequests: 5_000,
        highTrafficMiB: 1_000,
        lowPathDiversityMinRequests: 100,
        lowPathDiversityRatio: 0.1,
        concentrationRatio: 0.8,
        narrowWindowMinRequests: 1_000,
        narrowWindowMaxActiveHours: 2,
        errorRate: 0.5,
        errorStatusCodes: [404, 403, 500],
    },
    networkThresholds: {
        manyMembers: 50,
        severalMembers: 20,
        highAverageRequests: 5_000,
        highTrafficGiB: 10,
        coordinatedMinMembers: 10,
        coordinatedAverageRequests: 10_000,
    },
    classification: {
        suspiciousScore: 30,
        minReasons: 3,
        suspiciousNetworkScore: 25,
    },
    blockPlan: {
        highRiskScore: 60,
        mediumRiskScore: 30,
        immediateBlockLimit: 20,
        monitorLimit: 30,
        networkMinSources: {
            IPv4: 3,
            IPv6: 5,
        },
    },
    automationPatterns: [
        'python',
        'curl',
        'wget',
        'bot',
        'spider',
        'crawler',
        'scraper',
        'scanner',
        'test',
        'monitor',
    ],
    report: {
        topSources: 50,
        topNetworks: 20,
    },
};
