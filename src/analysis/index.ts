// Domain types
export * from './types/index.js';

// Aggregation
export { StatsAggregator, type IngestOptions, type IngestOutcome } from './StatsAggregator.js';
export {
    getActiveHours,
    getPeakHourlyRequests,
    getRequestsPerHour,
} from './stats/sourceStats.js';
export {
    AGGREGATION_PREFIXES,
    BLOCK_SUGGESTION_PREFIXES,
    containingBlock,
    parseAddress,
    type ParsedAddress,
} from './addressing.js';

// Scoring and advice
export { percentile, computeBaseline } from './percentile.js';
export * from './rules/index.js';
export { RiskScorer, type RiskScorerRules, type ScoringResult } from './RiskScorer.js';
export { BlockAdvisor } from './BlockAdvisor.js';

// Pipeline, configuration and errors
export { AnalysisService, getAnalysisService, type AnalyzeOptions } from './AnalysisService.js';
export {
    ConfigurationManager,
    ConfigurationError,
    getConfigurationManager,
    initializeConfigurationManager,
    type AnalysisConfigUpdate,
} from './ConfigurationManager.js';
export {
    AnalysisErrorHandler,
    AnalysisErrorType,
    IngestionError,
    analysisErrorHandler,
} from './ErrorHandler.js';
