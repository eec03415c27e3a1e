import type { LogRecord } from './types/LogRecord.js';
import type { Granularity, NetworkStats } from './types/NetworkStats.js';
import type { SourceStats } from './types/SourceStats.js';
import type { IngestionResult, StatsSnapshot, TimePatterns, TrafficSummary } from './types/Report.js';
import { AGGREGATION_PREFIXES, containingBlock, granularityOf, parseAddress } from './addressing.js';
import { parseTimestamp } from './time.js';
import { getOrCreate } from './stats/getOrCreate.js';
import {
    createSourceStats,
    mergeSourceStats,
    recordRequest,
    type MutableSourceStats,
} from './stats/sourceStats.js';
import {
    addMemberRequest,
    createNetworkStats,
    mergeNetworkStats,
    networkKey,
    type MutableNetworkStats,
} from './stats/networkStats.js';
import { AnalysisErrorHandler, IngestionError, analysisErrorHandler } from './ErrorHandler.js';

const MIB = 1024 * 1024;
const GIB = 1024 * MIB;

/**
 * Outcome of applying one record
 */
export type IngestOutcome = 'applied' | 'source-only';

export interface IngestOptions {
    /** Checked between records; once aborted the fold stops */
    signal?: AbortSignal;
}

interface NetworkTarget {
    granularity: Granularity;
    cidr: string;
}

/**
 * Accumulates per-source and per-network statistics from log records.
 *
 * Ingestion is a fold: shard-local aggregators can be combined with
 * `merge`. Taking a snapshot seals the aggregator so scoring never sees
 * statistics that can still change.
 */
export class StatsAggregator {
    private readonly sources = new Map<string, MutableSourceStats>();
    private readonly networks = new Map<string, MutableNetworkStats>();
    private sealed = false;
    private networkSkipped = 0;

    constructor(private readonly errorHandler: AnalysisErrorHandler = analysisErrorHandler) {}

    /**
     * Apply one record to its source and, when the address parses, to the two
     * blocks of its family. Throws IngestionError without changing any state
     * when the record is rejected.
     */
    ingest(record: LogRecord): IngestOutcome {
        if (this.sealed) {
            throw new IngestionError('Aggregator has been snapshotted; start a new one', 'AGGREGATOR_SEALED');
        }

        const seenAt = this.validateRecord(record);
        const targets = this.resolveNetworks(record.source);

        recordRequest(getOrCreate(this.sources, record.source, createSourceStats), record, seenAt);

        if (targets === null) {
            this.networkSkipped++;
            this.errorHandler.handleInvalidAddress();
            return 'source-only';
        }

        for (const { granularity, cidr } of targets) {
            const stats = getOrCreate(this.networks, networkKey(granularity, cidr), () =>
                createNetworkStats(granularity, cidr)
            );
            addMemberRequest(stats, record.source, record.bytes);
        }
        return 'applied';
    }

    /**
     * Fold a sequence of records. Rejected records are reported and skipped.
     */
    async ingestAll(
        records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
        options: IngestOptions = {}
    ): Promise<IngestionResult> {
        const result: IngestionResult = { accepted: 0, rejected: 0, networkSkipped: 0, aborted: false };
        const skippedBefore = this.networkSkipped;

        for await (const record of records) {
            if (options.signal?.aborted) {
                result.aborted = true;
                break;
            }

            try {
                this.ingest(record);
                result.accepted++;
            } catch (error) {
                if (!(error instanceof IngestionError) || error.code !== 'INVALID_RECORD') {
                    throw error;
                }
                this.errorHandler.handleInvalidRecord(record, error);
                result.rejected++;
            }
        }

        result.networkSkipped = this.networkSkipped - skippedBefore;
        return result;
    }

    /**
     * Seal the aggregator and return a read-only view of its statistics
     */
    snapshot(): StatsSnapshot {
        this.sealed = true;
        return {
            sources: this.sources,
            networks: this.networks,
        };
    }

    isSealed(): boolean {
        return this.sealed;
    }

    /**
     * Records accepted so far whose address could not be rolled up
     */
    getNetworkSkippedCount(): number {
        return this.networkSkipped;
    }

    /**
     * Run-wide totals; all zero when nothing was ingested
     */
    summary(): TrafficSummary {
        let totalRequests = 0;
        let totalBytes = 0;
        for (const stats of this.sources.values()) {
            totalRequests += stats.requestCount;
            totalBytes += stats.totalBytes;
        }

        const totalSources = this.sources.size;
        return {
            totalSources,
            totalRequests,
            totalBytes,
            totalMiB: totalBytes / MIB,
            totalGiB: totalBytes / GIB,
            averageRequestsPerSource: totalSources === 0 ? 0 : totalRequests / totalSources,
            averageBytesPerSource: totalSources === 0 ? 0 : totalBytes / totalSources,
        };
    }

    /**
     * Requests per hour of day and per day across all sources
     */
    timePatterns(): TimePatterns {
        const hourOfDay = new Array<number>(24).fill(0);
        const daily = new Map<string, number>();

        for (const stats of this.sources.values()) {
            for (const [bucket, count] of stats.hourlyRequests) {
                hourOfDay[Number(bucket.slice(8, 10))] += count;
                const day = bucket.slice(0, 8);
                daily.set(day, (daily.get(day) ?? 0) + count);
            }
        }

        const days = [...daily.keys()].sort();
        return {
            hourOfDay,
            daily: Object.fromEntries(days.map(day => [day, daily.get(day) ?? 0])),
        };
    }

    topSourcesByRequests(limit = 50): SourceStats[] {
        return [...this.sources.values()]
            .sort((a, b) => b.requestCount - a.requestCount)
            .slice(0, limit);
    }

    topSourcesByBytes(limit = 50): SourceStats[] {
        return [...this.sources.values()]
            .sort((a, b) => b.totalBytes - a.totalBytes)
            .slice(0, limit);
    }

    /**
     * Networks ordered by distinct members, then by requests
     */
    topNetworks(limit = 20): NetworkStats[] {
        return [...this.networks.values()]
            .sort((a, b) => b.memberCount - a.memberCount || b.totalRequests - a.totalRequests)
            .slice(0, limit);
    }

    /**
     * Combine with another aggregator into a new, unsealed one. Neither input
     * is modified. Counts and bytes add, sets union, first/last seen take
     * min/max and histograms add per key.
     */
    merge(other: StatsAggregator): StatsAggregator {
        const merged = new StatsAggregator(this.errorHandler);

        for (const input of [this, other]) {
            for (const [address, stats] of input.sources) {
                const existing = merged.sources.get(address) ?? createSourceStats(address);
                merged.sources.set(address, mergeSourceStats(existing, stats));
            }
            for (const [key, stats] of input.networks) {
                const existing = merged.networks.get(key) ?? createNetworkStats(stats.granularity, stats.cidr);
                merged.networks.set(key, mergeNetworkStats(existing, stats));
            }
            merged.networkSkipped += input.networkSkipped;
        }

        return merged;
    }

    /**
     * Shard index of an address (FNV-1a), so one source always lands in the
     * same shard
     */
    static shardForAddress(address: string, shardCount: number): number {
        let hash = 0x811c9dc5;
        for (let i = 0; i < address.length; i++) {
            hash ^= address.charCodeAt(i);
            hash = Math.imul(hash, 0x01000193) >>> 0;
        }
        return hash % shardCount;
    }

    /**
     * Ingest records into `shardCount` shard-local aggregators and merge the
     * shards pairwise into one
     */
    static async ingestSharded(
        records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
        shardCount: number,
        options: IngestOptions & { errorHandler?: AnalysisErrorHandler } = {}
    ): Promise<{ aggregator: StatsAggregator; result: IngestionResult }> {
        if (!Number.isInteger(shardCount) || shardCount < 1) {
            throw new RangeError(`Shard count must be a positive integer, got ${shardCount}`);
        }

        const errorHandler = options.errorHandler ?? analysisErrorHandler;
        const shards = Array.from({ length: shardCount }, () => new StatsAggregator(errorHandler));
        const result: IngestionResult = { accepted: 0, rejected: 0, networkSkipped: 0, aborted: false };

        for await (const record of records) {
            if (options.signal?.aborted) {
                result.aborted = true;
                break;
            }

            const shard = shards[StatsAggregator.shardForAddress(record.source, shardCount)];
            try {
                if (shard.ingest(record) === 'source-only') {
                    result.networkSkipped++;
                }
                result.accepted++;
            } catch (error) {
                if (!(error instanceof IngestionError) || error.code !== 'INVALID_RECORD') {
                    throw error;
                }
                errorHandler.handleInvalidRecord(record, error);
                result.rejected++;
            }
        }

        let level = shards;
        while (level.length > 1) {
            const next: StatsAggregator[] = [];
            for (let i = 0; i < level.length; i += 2) {
                next.push(i + 1 < level.length ? level[i].merge(level[i + 1]) : level[i]);
            }
            level = next;
        }

        return { aggregator: level[0], result };
    }

    /**
     * Validate a record before any state changes, returning its parsed time
     */
    private validateRecord(record: LogRecord): number {
        const seenAt = parseTimestamp(record.timestamp);
        if (seenAt === null) {
            throw new IngestionError(`Invalid timestamp "${record.timestamp}"`, 'INVALID_RECORD', 'timestamp');
        }
        if (!Number.isSafeInteger(record.bytes) || record.bytes < 0) {
            throw new IngestionError(`Invalid byte count ${record.bytes}`, 'INVALID_RECORD', 'bytes');
        }
        if (!Number.isInteger(record.statusCode) || record.statusCode < 0) {
            throw new IngestionError(`Invalid status code ${record.statusCode}`, 'INVALID_RECORD', 'statusCode');
        }
        return seenAt;
    }

    /**
     * Blocks the address belongs to, one per aggregation prefix of its
     * family, or null when it is not a network address
     */
    private resolveNetworks(address: string): NetworkTarget[] | null {
        const parsed = parseAddress(address);
        if (parsed === null) {
            return null;
        }

        return AGGREGATION_PREFIXES[parsed.family].map(prefixLength => ({
            granularity: granularityOf(parsed.family, prefixLength),
            cidr: containingBlock(parsed, prefixLength),
        }));
    }
}
