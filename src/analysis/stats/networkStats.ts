import type { Granularity, NetworkStats } from '../types/NetworkStats.js';

export interface MutableNetworkStats extends NetworkStats {
    members: Set<string>;
    memberCount: number;
    totalRequests: number;
    totalBytes: number;
}

export function networkKey(granularity: Granularity, cidr: string): string {
    return `${granularity}_${cidr}`;
}

export function createNetworkStats(granularity: Granularity, cidr: string): MutableNetworkStats {
    return {
        key: networkKey(granularity, cidr),
        granularity,
        cidr,
        members: new Set(),
        memberCount: 0,
        totalRequests: 0,
        totalBytes: 0,
    };
}

/**
 * Count one request from `address` against the block
 */
export function addMemberRequest(stats: MutableNetworkStats, address: string, bytes: number): void {
    stats.members.add(address);
    stats.memberCount = stats.members.size;
    stats.totalRequests += 1;
    stats.totalBytes += bytes;
}

/**
 * Combine two statistics of the same block into a new object; member sets
 * union so shared addresses are counted once
 */
export function mergeNetworkStats(left: NetworkStats, right: NetworkStats): MutableNetworkStats {
    const merged = createNetworkStats(left.granularity, left.cidr);
    merged.members = new Set([...left.members, ...right.members]);
    merged.memberCount = merged.members.size;
    merged.totalRequests = left.totalRequests + right.totalRequests;
    merged.totalBytes = left.totalBytes + right.totalBytes;
    return merged;
}
