import type { BlockPlan, RiskTier } from './types/BlockPlan.js';
import type { BlockPlanConfig } from './types/Configuration.js';
import { DEFAULT_ANALYSIS_CONFIG } from './types/Configuration.js';
import type { AddressFamily } from './types/NetworkStats.js';
import type { RiskAssessment } from './types/RiskAssessment.js';
import { BLOCK_SUGGESTION_PREFIXES, containingBlock, parseAddress } from './addressing.js';
import { getOrCreate } from './stats/getOrCreate.js';

/**
 * Turns ranked suspicious sources into a block/monitor plan
 */
export class BlockAdvisor {
    constructor(private readonly config: BlockPlanConfig = DEFAULT_ANALYSIS_CONFIG.blockPlan) {}

    classifyTier(riskScore: number): RiskTier {
        if (riskScore >= this.config.highRiskScore) {
            return 'high';
        }
        if (riskScore >= this.config.mediumRiskScore) {
            return 'medium';
        }
        return 'low';
    }

    /**
     * Build the plan from suspicious sources in rank order. Low-tier entries
     * (suspicious through reason count alone) only count towards the total.
     */
    advise(suspiciousSources: readonly RiskAssessment[]): BlockPlan {
        const highRisk = suspiciousSources.filter(source => this.classifyTier(source.riskScore) === 'high');
        const mediumRisk = suspiciousSources.filter(source => this.classifyTier(source.riskScore) === 'medium');

        const groups = this.groupByBlock(highRisk);
        const networkBlocks: Record<string, string> = {};
        const suggested: Record<AddressFamily, number> = { IPv4: 0, IPv6: 0 };

        for (const family of ['IPv6', 'IPv4'] as const) {
            for (const [cidr, members] of groups[family]) {
                if (members.length >= this.config.networkMinSources[family]) {
                    networkBlocks[cidr] = `${members.length} high-risk sources`;
                    suggested[family]++;
                }
            }
        }

        return {
            immediateBlock: highRisk.slice(0, this.config.immediateBlockLimit).map(source => source.address),
            monitorClosely: mediumRisk.slice(0, this.config.monitorLimit).map(source => source.address),
            networkBlocks,
            statistics: {
                totalSuspicious: suspiciousSources.length,
                highRisk: highRisk.length,
                mediumRisk: mediumRisk.length,
                suggestedIpv4Networks: suggested.IPv4,
                suggestedIpv6Networks: suggested.IPv6,
            },
        };
    }

    /**
     * Group addresses by their suggestion block, per family, in first-seen order
     */
    private groupByBlock(sources: readonly RiskAssessment[]): Record<AddressFamily, Map<string, string[]>> {
        const groups: Record<AddressFamily, Map<string, string[]>> = {
            IPv4: new Map(),
            IPv6: new Map(),
        };

        for (const source of sources) {
            const parsed = parseAddress(source.address);
            if (parsed === null) {
                continue;
            }
            const cidr = containingBlock(parsed, BLOCK_SUGGESTION_PREFIXES[parsed.family]);
            getOrCreate(groups[parsed.family], cidr, () => []).push(source.address);
        }

        return groups;
    }
}
