import {
    ConfigurationManager,
    ConfigurationError,
    getConfigurationManager,
    initializeConfigurationManager,
} from '../src/analysis/ConfigurationManager';
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from '../src/analysis/types/Configuration';

describe('ConfigurationManager', () => {
    let configManager: ConfigurationManager;

    beforeEach(() => {
        jest.spyOn(console, 'info').mockImplementation(() => undefined);
        configManager = new ConfigurationManager({});
    });

    afterEach(() => {
        configManager.destroy();
        jest.restoreAllMocks();
    });

    describe('constructor', () => {
        it('should initialize with default configuration', () => {
            expect(configManager.getConfig()).toEqual(DEFAULT_ANALYSIS_CONFIG);
        });

        it('should load configuration from environment variables', () => {
            const manager = new ConfigurationManager({
                EDGE_ANALYSIS_HIGH_TOTAL_REQUESTS: '20000',
                EDGE_ANALYSIS_LOW_PATH_DIVERSITY_RATIO: '0.05',
                EDGE_ANALYSIS_IPV6_NETWORK_MIN_SOURCES: '8',
                EDGE_ANALYSIS_AUTOMATION_PATTERNS: ' Curl, HeadlessChrome ,,',
            });
            const config = manager.getConfig();

            expect(config.sourceThresholds.highTotalRequests).toBe(20000);
            expect(config.sourceThresholds.lowPathDiversityRatio).toBe(0.05);
            expect(config.blockPlan.networkMinSources).toEqual({ IPv4: 3, IPv6: 8 });
            expect(config.automationPatterns).toEqual(['curl', 'headlesschrome']);

            manager.destroy();
        });

        it('should ignore empty environment values', () => {
            const manager = new ConfigurationManager({ EDGE_ANALYSIS_SUSPICIOUS_SCORE: '  ' });
            expect(manager.getConfig().classification.suspiciousScore).toBe(30);
            manager.destroy();
        });

        it('should reject non-numeric environment values', () => {
            expect(() => new ConfigurationManager({ EDGE_ANALYSIS_HIGH_RISK_SCORE: 'high' })).toThrow(
                'EDGE_ANALYSIS_HIGH_RISK_SCORE must be a number, got "high"'
            );
        });

        it('should reject environment values that fail validation', () => {
            expect(() => new ConfigurationManager({ EDGE_ANALYSIS_MEDIUM_RISK_SCORE: '70' })).toThrow(
                ConfigurationError
            );
        });
    });

    describe('getConfig', () => {
        it('should return a copy of the configuration', () => {
            const config1 = configManager.getConfig();
            const config2 = configManager.getConfig();

            expect(config1).toEqual(config2);
            expect(config1).not.toBe(config2);

            config1.automationPatterns.push('mutated');
            expect(configManager.getConfig().automationPatterns).not.toContain('mutated');
        });
    });

    describe('updateConfig', () => {
        it('should update configuration and emit change event', () => {
            const listener = jest.fn();
            configManager.on('configChanged', listener);

            configManager.updateConfig({
                classification: { suspiciousScore: 40 },
                networkThresholds: { manyMembers: 60 },
            });

            const config = configManager.getConfig();
            expect(config.classification).toEqual({ suspiciousScore: 40, minReasons: 3, suspiciousNetworkScore: 25 });
            expect(config.networkThresholds.manyMembers).toBe(60);

            expect(listener).toHaveBeenCalledTimes(1);
            const [updated, previous] = listener.mock.calls[0];
            expect(updated.classification.suspiciousScore).toBe(40);
            expect(previous.classification.suspiciousScore).toBe(30);
        });

        it('should log the changed values', () => {
            configManager.updateConfig({ report: { topSources: 10 } });

            expect(console.info).toHaveBeenCalledWith('Analysis configuration updated', {
                changes: { 'report.topSources': { from: '50', to: '10' } },
            });
        });

        it.each<[string, Parameters<ConfigurationManager['updateConfig']>[0], string]>([
            ['tier order', { blockPlan: { mediumRiskScore: 60 } }, 'Medium risk score must be less than high risk score'],
            ['ratio range', { sourceThresholds: { errorRate: 1.5 } }, 'errorRate must be between 0 and 1'],
            ['reason count', { classification: { minReasons: 0 } }, 'minReasons must be a positive integer'],
            ['member order', { networkThresholds: { severalMembers: 80 } }, 'severalMembers must not exceed manyMembers'],
            ['pattern case', { automationPatterns: ['Bot'] }, 'Automation patterns must be non-empty lower-case strings'],
        ])('should reject an invalid %s and keep the old configuration', (_, update, message) => {
            const before: AnalysisConfig = configManager.getConfig();

            expect(() => configManager.updateConfig(update)).toThrow(message);
            expect(configManager.getConfig()).toEqual(before);
        });

        it('should report the failing field', () => {
            try {
                configManager.updateConfig({ blockPlan: { monitorLimit: -1 } });
                throw new Error('expected a ConfigurationError');
            } catch (error) {
                expect(error).toBeInstanceOf(ConfigurationError);
                if (error instanceof ConfigurationError) {
                    expect(error.field).toBe('blockPlan.monitorLimit');
                }
            }
        });
    });

    describe('singleton', () => {
        it('should replace the global instance on initialization', () => {
            const manager = initializeConfigurationManager({ EDGE_ANALYSIS_TOP_SOURCES: '5' });

            expect(getConfigurationManager()).toBe(manager);
            expect(getConfigurationManager().getConfig().report.topSources).toBe(5);

            initializeConfigurationManager({});
        });
    });
});
