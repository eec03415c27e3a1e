/**
 * Severity tier of a scored source
 */
export type RiskTier = 'high' | 'medium' | 'low';

/**
 * Actionable block and monitor recommendations derived from the ranked suspicious sources
 */
export interface BlockPlan {
    /** High-tier addresses in rank order, capped */
    immediateBlock: string[];
    /** Medium-tier addresses in rank order, capped */
    monitorClosely: string[];
    /** CIDR to justification, e.g. `"4 high-risk sources"` */
    networkBlocks: Record<string, string>;
    statistics: BlockPlanStatistics;
}

export interface BlockPlanStatistics {
    totalSuspicious: number;
    highRisk: number;
    mediumRisk: number;
    suggestedIpv4Networks: number;
    suggestedIpv6Networks: number;
}
