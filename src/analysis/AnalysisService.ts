import type { LogRecord } from './types/LogRecord.js';
import type { AnalysisReport, IngestionResult } from './types/Report.js';
import { StatsAggregator, type IngestOptions } from './StatsAggregator.js';
import { RiskScorer } from './RiskScorer.js';
import { BlockAdvisor } from './BlockAdvisor.js';
import { ConfigurationManager, getConfigurationManager } from './ConfigurationManager.js';
import { AnalysisErrorHandler, analysisErrorHandler } from './ErrorHandler.js';
import { LogParser } from '../ingest/LogParser.js';
import { LogFileReader } from '../ingest/LogFileReader.js';
import { AnalysisLogger, getAnalysisLogger } from '../utils/logger/analysisLogger.js';

export interface AnalyzeOptions extends IngestOptions {
    /** Ingest into this many shard-local aggregators and merge them */
    shards?: number;
    /** What the run analyzes, recorded in the run log */
    origin?: string;
}

/**
 * Runs the whole pipeline: ingest records, seal the snapshot, score it and
 * derive the block plan
 */
export class AnalysisService {
    constructor(
        private readonly configManager: ConfigurationManager = getConfigurationManager(),
        private readonly logger: AnalysisLogger = getAnalysisLogger(),
        private readonly errorHandler: AnalysisErrorHandler = analysisErrorHandler
    ) {}

    async analyze(
        records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
        options: AnalyzeOptions = {}
    ): Promise<AnalysisReport> {
        const context = this.logger.createRunContext(options.origin ?? 'records');
        this.logger.logAnalysisStart(context);

        try {
            const config = this.configManager.getConfig();
            const { aggregator, ingestion } = await this.ingest(records, options);

            const snapshot = aggregator.snapshot();
            const scoring = new RiskScorer(config).score(snapshot);
            const blockPlan = new BlockAdvisor(config.blockPlan).advise(scoring.suspiciousSources);

            const report: AnalysisReport = {
                runId: context.runId,
                origin: context.origin,
                generatedAt: Date.now(),
                config,
                ingestion,
                summary: aggregator.summary(),
                timePatterns: aggregator.timePatterns(),
                baseline: scoring.baseline,
                suspiciousSources: scoring.suspiciousSources,
                suspiciousNetworks: scoring.suspiciousNetworks,
                blockPlan,
                topSourcesByRequests: aggregator.topSourcesByRequests(config.report.topSources),
                topSourcesByBytes: aggregator.topSourcesByBytes(config.report.topSources),
                topNetworks: aggregator.topNetworks(config.report.topNetworks),
                snapshot,
            };

            this.logger.logAnalysisComplete(context, report);
            return report;
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.logger.logAnalysisError(context, failure);
            throw failure;
        }
    }

    /**
     * Analyze raw edge log lines; lines that do not parse are skipped
     */
    async analyzeLines(lines: Iterable<string>, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
        const parser = new LogParser(this.errorHandler);
        return this.analyze(parser.parseLines(lines), { origin: 'lines', ...options });
    }

    /**
     * Analyze every `.gz` log file of a directory
     */
    async analyzeDirectory(dir: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
        const reader = new LogFileReader({ errorHandler: this.errorHandler });
        return this.analyze(reader.readDirectory(dir), { origin: dir, ...options });
    }

    private async ingest(
        records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
        options: AnalyzeOptions
    ): Promise<{ aggregator: StatsAggregator; ingestion: IngestionResult }> {
        if (options.shards !== undefined && options.shards > 1) {
            const { aggregator, result } = await StatsAggregator.ingestSharded(records, options.shards, {
                signal: options.signal,
                errorHandler: this.errorHandler,
            });
            return { aggregator, ingestion: result };
        }

        const aggregator = new StatsAggregator(this.errorHandler);
        const ingestion = await aggregator.ingestAll(records, { signal: options.signal });
        return { aggregator, ingestion };
    }
}

let analysisService: AnalysisService | null = null;

/**
 * Get the global analysis service instance
 */
export function getAnalysisService(): AnalysisService {
    if (!analysisService) {
        analysisService = new AnalysisService();
    }
    return analysisService;
}
