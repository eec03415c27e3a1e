import { EventEmitter } from 'events';
import {
    AnalysisConfig,
    DEFAULT_ANALYSIS_CONFIG,
    type NetworkThresholds,
    type SourceThresholds,
} from './types/Configuration.js';

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Deep partial update of the analysis configuration
 */
export type AnalysisConfigUpdate = {
    [K in keyof AnalysisConfig]?: AnalysisConfig[K] extends unknown[]
        ? AnalysisConfig[K]
        : Partial<AnalysisConfig[K]>;
};

const ENV_PREFIX = 'EDGE_ANALYSIS_';

const SOURCE_NUMERIC_FIELDS: ReadonlyArray<Exclude<keyof SourceThresholds, 'errorStatusCodes'>> = [
    'highTotalRequests',
    'highRequestRatePerHour',
    'highPeakHourlyRequests',
    'highTrafficMiB',
    'lowPathDiversityMinRequests',
    'lowPathDiversityRatio',
    'concentrationRatio',
    'narrowWindowMinRequests',
    'narrowWindowMaxActiveHours',
    'errorRate',
];

const NETWORK_FIELDS: ReadonlyArray<keyof NetworkThresholds> = [
    'manyMembers',
    'severalMembers',
    'highAverageRequests',
    'highTrafficGiB',
    'coordinatedMinMembers',
    'coordinatedAverageRequests',
];

/**
 * Flatten a configuration into dotted paths with JSON-encoded leaf values
 */
function flattenConfig(config: AnalysisConfig): Map<string, string> {
    const entries = new Map<string, string>();
    const visit = (value: unknown, path: string): void => {
        if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
            for (const [key, child] of Object.entries(value)) {
                visit(child, path ? `${path}.${key}` : key);
            }
            return;
        }
        entries.set(path, JSON.stringify(value));
    };
    visit(config, '');
    return entries;
}

/**
 * Configuration manager for the edge traffic analysis.
 * Loads defaults, applies `EDGE_ANALYSIS_*` environment overrides and
 * validates every change.
 */
export class ConfigurationManager extends EventEmitter {
    private config: AnalysisConfig;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        super();
        this.config = this.loadConfiguration();
    }

    /**
     * Get a copy of the current configuration
     */
    getConfig(): AnalysisConfig {
        return structuredClone(this.config);
    }

    /**
     * Update configuration and emit change event
     */
    updateConfig(update: AnalysisConfigUpdate): void {
        const mergedConfig = this.mergeConfig(this.config, update);
        this.validateConfiguration(mergedConfig);

        const oldConfig = this.config;
        this.config = mergedConfig;

        console.info('Analysis configuration updated', {
            changes: this.getConfigChanges(oldConfig, mergedConfig),
        });

        this.emit('configChanged', this.getConfig(), oldConfig);
    }

    /**
     * Load configuration from defaults and environment variables
     */
    private loadConfiguration(): AnalysisConfig {
        const config = structuredClone(DEFAULT_ANALYSIS_CONFIG);
        this.loadFromEnvironment(config);
        this.validateConfiguration(config);
        return config;
    }

    /**
     * Apply environment overrides
     */
    private loadFromEnvironment(config: AnalysisConfig): void {
        const source = config.sourceThresholds;
        source.highTotalRequests = this.readNumber('HIGH_TOTAL_REQUESTS', source.highTotalRequests);
        source.highRequestRatePerHour = this.readNumber('HIGH_REQUEST_RATE_PER_HOUR', source.highRequestRatePerHour);
        source.highPeakHourlyRequests = this.readNumber('HIGH_PEAK_HOURLY_REQUESTS', source.highPeakHourlyRequests);
        source.highTrafficMiB = this.readNumber('HIGH_TRAFFIC_MIB', source.highTrafficMiB);
        source.lowPathDiversityRatio = this.readNumber('LOW_PATH_DIVERSITY_RATIO', source.lowPathDiversityRatio);
        source.concentrationRatio = this.readNumber('CONCENTRATION_RATIO', source.concentrationRatio);
        source.errorRate = this.readNumber('ERROR_RATE', source.errorRate);

        const network = config.networkThresholds;
        network.manyMembers = this.readNumber('NETWORK_MANY_MEMBERS', network.manyMembers);
        network.severalMembers = this.readNumber('NETWORK_SEVERAL_MEMBERS', network.severalMembers);
        network.highAverageRequests = this.readNumber('NETWORK_HIGH_AVERAGE_REQUESTS', network.highAverageRequests);
        network.highTrafficGiB = this.readNumber('NETWORK_HIGH_TRAFFIC_GIB', network.highTrafficGiB);

        const classification = config.classification;
        classification.suspiciousScore = this.readNumber('SUSPICIOUS_SCORE', classification.suspiciousScore);
        classification.minReasons = this.readNumber('MIN_REASONS', classification.minReasons);
        classification.suspiciousNetworkScore = this.readNumber(
            'SUSPICIOUS_NETWORK_SCORE',
            classification.suspiciousNetworkScore
        );

        const blockPlan = config.blockPlan;
        blockPlan.highRiskScore = this.readNumber('HIGH_RISK_SCORE', blockPlan.highRiskScore);
        blockPlan.mediumRiskScore = this.readNumber('MEDIUM_RISK_SCORE', blockPlan.mediumRiskScore);
        blockPlan.immediateBlockLimit = this.readNumber('IMMEDIATE_BLOCK_LIMIT', blockPlan.immediateBlockLimit);
        blockPlan.monitorLimit = this.readNumber('MONITOR_LIMIT', blockPlan.monitorLimit);
        blockPlan.networkMinSources.IPv4 = this.readNumber('IPV4_NETWORK_MIN_SOURCES', blockPlan.networkMinSources.IPv4);
        blockPlan.networkMinSources.IPv6 = this.readNumber('IPV6_NETWORK_MIN_SOURCES', blockPlan.networkMinSources.IPv6);

        const patterns = this.env[`${ENV_PREFIX}AUTOMATION_PATTERNS`];
        if (patterns !== undefined) {
            config.automationPatterns = patterns
                .split(',')
                .map(pattern => pattern.trim().toLowerCase())
                .filter(Boolean);
        }

        config.report.topSources = this.readNumber('TOP_SOURCES', config.report.topSources);
        config.report.topNetworks = this.readNumber('TOP_NETWORKS', config.report.topNetworks);
    }

    private readNumber(name: string, fallback: number): number {
        const raw = this.env[`${ENV_PREFIX}${name}`];
        if (raw === undefined || raw.trim() === '') {
            return fallback;
        }

        const value = Number(raw);
        if (!Number.isFinite(value)) {
            throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got "${raw}"`, name);
        }
        return value;
    }

    /**
     * Validate configuration values
     */
    private validateConfiguration(config: AnalysisConfig): void {
        const source = config.sourceThresholds;
        for (const field of SOURCE_NUMERIC_FIELDS) {
            if (!Number.isFinite(source[field]) || source[field] < 0) {
                throw new ConfigurationError(`${field} must be non-negative`, `sourceThresholds.${field}`);
            }
        }
        for (const field of ['lowPathDiversityRatio', 'concentrationRatio', 'errorRate'] as const) {
            if (source[field] > 1) {
                throw new ConfigurationError(`${field} must be between 0 and 1`, `sourceThresholds.${field}`);
            }
        }

        const network = config.networkThresholds;
        for (const field of NETWORK_FIELDS) {
            if (!Number.isFinite(network[field]) || network[field] < 0) {
                throw new ConfigurationError(`${field} must be non-negative`, `networkThresholds.${field}`);
            }
        }
        if (network.severalMembers > network.manyMembers) {
            throw new ConfigurationError(
                'severalMembers must not exceed manyMembers',
                'networkThresholds.severalMembers'
            );
        }

        const classification = config.classification;
        if (classification.suspiciousScore < 0 || classification.suspiciousNetworkScore < 0) {
            throw new ConfigurationError('Suspicious thresholds must be non-negative', 'classification');
        }
        if (!Number.isInteger(classification.minReasons) || classification.minReasons < 1) {
            throw new ConfigurationError('minReasons must be a positive integer', 'classification.minReasons');
        }

        const blockPlan = config.blockPlan;
        if (blockPlan.mediumRiskScore >= blockPlan.highRiskScore) {
            throw new ConfigurationError('Medium risk score must be less than high risk score', 'blockPlan');
        }
        for (const field of ['immediateBlockLimit', 'monitorLimit'] as const) {
            if (!Number.isInteger(blockPlan[field]) || blockPlan[field] < 0) {
                throw new ConfigurationError(`${field} must be a non-negative integer`, `blockPlan.${field}`);
            }
        }
        for (const family of ['IPv4', 'IPv6'] as const) {
            const minimum = blockPlan.networkMinSources[family];
            if (!Number.isInteger(minimum) || minimum < 1) {
                throw new ConfigurationError(
                    `${family} network minimum must be a positive integer`,
                    `blockPlan.networkMinSources.${family}`
                );
            }
        }

        if (config.automationPatterns.some(pattern => pattern.length === 0 || pattern !== pattern.toLowerCase())) {
            throw new ConfigurationError('Automation patterns must be non-empty lower-case strings', 'automationPatterns');
        }

        for (const field of ['topSources', 'topNetworks'] as const) {
            if (!Number.isInteger(config.report[field]) || config.report[field] < 0) {
                throw new ConfigurationError(`${field} must be a non-negative integer`, `report.${field}`);
            }
        }
    }

    /**
     * Merge configuration objects
     */
    private mergeConfig(base: AnalysisConfig, updates: AnalysisConfigUpdate): AnalysisConfig {
        const merged = structuredClone(base);
        return {
            sourceThresholds: { ...merged.sourceThresholds, ...updates.sourceThresholds },
            networkThresholds: { ...merged.networkThresholds, ...updates.networkThresholds },
            classification: { ...merged.classification, ...updates.classification },
            blockPlan: { ...merged.blockPlan, ...updates.blockPlan },
            automationPatterns: updates.automationPatterns ?? merged.automationPatterns,
            report: { ...merged.report, ...updates.report },
        };
    }

    /**
     * Get configuration changes for logging
     */
    private getConfigChanges(
        oldConfig: AnalysisConfig,
        newConfig: AnalysisConfig
    ): Record<string, { from?: string; to: string }> {
        const before = flattenConfig(oldConfig);
        const changes: Record<string, { from?: string; to: string }> = {};

        for (const [path, value] of flattenConfig(newConfig)) {
            if (before.get(path) !== value) {
                changes[path] = { from: before.get(path), to: value };
            }
        }

        return changes;
    }

    /**
     * Cleanup resources
     */
    destroy(): void {
        this.removeAllListeners();
    }
}

// Singleton instance
let configManager: ConfigurationManager | null = null;

/**
 * Get the global configuration manager instance
 */
export function getConfigurationManager(): ConfigurationManager {
    if (!configManager) {
        configManager = new ConfigurationManager();
    }
    return configManager;
}

/**
 * Replace the global configuration manager, re-reading the environment
 */
export function initializeConfigurationManager(env: NodeJS.ProcessEnv = process.env): ConfigurationManager {
    if (configManager) {
        configManager.destroy();
    }
    configManager = new ConfigurationManager(env);
    return configManager;
}
