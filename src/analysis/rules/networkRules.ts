import type { NetworkStats } from '../types/NetworkStats.js';
import { GIB, formatCount, formatGiB } from './format.js';
import type { NetworkRule } from './types.js';

function averageRequestsPerMember(stats: NetworkStats): number {
    return stats.totalRequests / Math.max(1, stats.memberCount);
}

/**
 * Per-network rules in evaluation order
 */
export const NETWORK_RULES: readonly NetworkRule[] = [
    {
        id: 'many-members',
        reason: 'many member addresses',
        applies: (stats, { config }) => stats.memberCount >= config.networkThresholds.manyMembers,
        weight: () => 40,
        detail: stats => `${stats.memberCount} addresses`,
    },
    {
        id: 'several-members',
        reason: 'several member addresses',
        applies: (stats, { config }) =>
            stats.memberCount >= config.networkThresholds.severalMembers &&
            stats.memberCount < config.networkThresholds.manyMembers,
        weight: () => 20,
        detail: stats => `${stats.memberCount} addresses`,
    },
    {
        id: 'high-average-requests',
        reason: 'high average requests per address',
        applies: (stats, { config }) => averageRequestsPerMember(stats) > config.networkThresholds.highAverageRequests,
        weight: () => 30,
        detail: stats => `${formatCount(averageRequestsPerMember(stats))} requests/address`,
    },
    {
        id: 'high-traffic-volume',
        reason: 'high traffic volume',
        applies: (stats, { config }) => stats.totalBytes > config.networkThresholds.highTrafficGiB * GIB,
        weight: () => 25,
        detail: stats => formatGiB(stats.totalBytes),
    },
    {
        id: 'coordinated-activity',
        reason: 'coordinated activity',
        applies: (stats, { config }) =>
            stats.memberCount > config.networkThresholds.coordinatedMinMembers &&
            averageRequestsPerMember(stats) > config.networkThresholds.coordinatedAverageRequests,
        weight: () => 20,
        detail: stats => `${stats.memberCount} addresses averaging ${formatCount(averageRequestsPerMember(stats))} requests`,
    },
];
