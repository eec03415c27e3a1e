import type { BlockPlan } from './BlockPlan.js';
import type { AnalysisConfig } from './Configuration.js';
import type { NetworkStats } from './NetworkStats.js';
import type { NetworkRiskAssessment, PercentileBaseline, RiskAssessment } from './RiskAssessment.js';
import type { SourceStats } from './SourceStats.js';

/**
 * Read-only view of one run's statistics, taken once ingestion is complete
 */
export interface StatsSnapshot {
    readonly sources: ReadonlyMap<string, SourceStats>;
    readonly networks: ReadonlyMap<string, NetworkStats>;
}

/**
 * Run-wide traffic totals
 */
export interface TrafficSummary {
    totalSources: number;
    totalRequests: number;
    totalBytes: number;
    totalMiB: number;
    totalGiB: number;
    averageRequestsPerSource: number;
    averageBytesPerSource: number;
}

/**
 * Request distribution over time, summed across all sources
 */
export interface TimePatterns {
    /** Requests per hour of day, index 0-23 */
    hourOfDay: number[];
    /** Requests per day, keyed `YYYYMMDD`, in ascending day order */
    daily: Record<string, number>;
}

/**
 * Counters of one ingestion fold
 */
export interface IngestionResult {
    accepted: number;
    rejected: number;
    /** Accepted records whose address could not be rolled up into networks */
    networkSkipped: number;
    /** Whether the fold stopped on an abort signal */
    aborted: boolean;
}

/**
 * Everything one analysis run produces
 */
export interface AnalysisReport {
    runId: string;
    /** What was analyzed, e.g. a log directory or `http` */
    origin: string;
    generatedAt: number;
    /** Configuration the run was scored with */
    config: AnalysisConfig;
    ingestion: IngestionResult;
    summary: TrafficSummary;
    timePatterns: TimePatterns;
    baseline: PercentileBaseline;
    suspiciousSources: RiskAssessment[];
    suspiciousNetworks: NetworkRiskAssessment[];
    blockPlan: BlockPlan;
    topSourcesByRequests: SourceStats[];
    topSourcesByBytes: SourceStats[];
    topNetworks: NetworkStats[];
    snapshot: StatsSnapshot;
}
