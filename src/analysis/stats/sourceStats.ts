import type { LogRecord } from '../types/LogRecord.js';
import type { SourceStats } from '../types/SourceStats.js';
import { MS_PER_HOUR, hourBucket } from '../time.js';

/**
 * Writable form of SourceStats, owned by the aggregator
 */
export interface MutableSourceStats extends SourceStats {
    requestCount: number;
    totalBytes: number;
    paths: Set<string>;
    userAgents: Set<string>;
    domains: Set<string>;
    statusCodes: Map<number, number>;
    hourlyRequests: Map<string, number>;
    firstSeen: number | null;
    lastSeen: number | null;
}

/**
 * Zero-initialized statistics for an address
 */
export function createSourceStats(address: string): MutableSourceStats {
    return {
        address,
        requestCount: 0,
        totalBytes: 0,
        paths: new Set(),
        userAgents: new Set(),
        domains: new Set(),
        statusCodes: new Map(),
        hourlyRequests: new Map(),
        firstSeen: null,
        lastSeen: null,
    };
}

/**
 * Apply one validated record, `seenAt` being its parsed timestamp
 */
export function recordRequest(stats: MutableSourceStats, record: LogRecord, seenAt: number): void {
    stats.requestCount += 1;
    stats.totalBytes += record.bytes;
    stats.paths.add(record.path);
    stats.userAgents.add(record.userAgent);
    stats.domains.add(record.domain);
    increment(stats.statusCodes, record.statusCode, 1);
    increment(stats.hourlyRequests, hourBucket(record.timestamp), 1);
    stats.firstSeen = earliest(stats.firstSeen, seenAt);
    stats.lastSeen = latest(stats.lastSeen, seenAt);
}

/**
 * Combine two statistics of the same address into a new object.
 * Associative and commutative; neither input is modified.
 */
export function mergeSourceStats(left: SourceStats, right: SourceStats): MutableSourceStats {
    const merged = createSourceStats(left.address);
    merged.requestCount = left.requestCount + right.requestCount;
    merged.totalBytes = left.totalBytes + right.totalBytes;
    merged.paths = new Set([...left.paths, ...right.paths]);
    merged.userAgents = new Set([...left.userAgents, ...right.userAgents]);
    merged.domains = new Set([...left.domains, ...right.domains]);

    for (const histogram of [left.statusCodes, right.statusCodes]) {
        for (const [status, count] of histogram) {
            increment(merged.statusCodes, status, count);
        }
    }
    for (const histogram of [left.hourlyRequests, right.hourlyRequests]) {
        for (const [bucket, count] of histogram) {
            increment(merged.hourlyRequests, bucket, count);
        }
    }

    merged.firstSeen = earliest(left.firstSeen, right.firstSeen);
    merged.lastSeen = latest(left.lastSeen, right.lastSeen);
    return merged;
}

/**
 * Requests per hour over the span between first and last request, the span
 * counting as at least one hour. Zero when nothing has been seen.
 */
export function getRequestsPerHour(stats: SourceStats): number {
    if (stats.firstSeen === null || stats.lastSeen === null) {
        return 0;
    }

    const hours = Math.max(1, (stats.lastSeen - stats.firstSeen) / MS_PER_HOUR);
    return stats.requestCount / hours;
}

/**
 * Request count of the busiest hour bucket
 */
export function getPeakHourlyRequests(stats: SourceStats): number {
    let peak = 0;
    for (const count of stats.hourlyRequests.values()) {
        peak = Math.max(peak, count);
    }
    return peak;
}

/**
 * Number of distinct hour buckets with at least one request
 */
export function getActiveHours(stats: SourceStats): number {
    return stats.hourlyRequests.size;
}

function increment<K>(histogram: Map<K, number>, key: K, amount: number): void {
    histogram.set(key, (histogram.get(key) ?? 0) + amount);
}

function earliest(current: number | null, candidate: number | null): number | null {
    if (current === null) return candidate;
    if (candidate === null) return current;
    return Math.min(current, candidate);
}

function latest(current: number | null, candidate: number | null): number | null {
    if (current === null) return candidate;
    if (candidate === null) return current;
    return Math.max(current, candidate);
}
