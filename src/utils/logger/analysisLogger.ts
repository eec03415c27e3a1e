import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { AnalysisReport } from '../../analysis/types/Report.js';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { isTest } from '../isTest.js';

/**
 * Context shared by every event of one analysis run
 */
export interface RunContext {
    runId: string;
    /** What the run analyzes, e.g. a directory path or `http` */
    origin: string;
    startedAt: number;
}

export type AnalysisEvent =
    | 'ANALYSIS_START'
    | 'ANALYSIS_COMPLETE'
    | 'ANALYSIS_ERROR'
    | 'REPORT_WRITTEN';

/**
 * Structured log entry for analysis runs
 */
export interface AnalysisLogEntry {
    runId: string;
    timestamp: number;
    level: 'info' | 'warn' | 'error';
    event: AnalysisEvent;
    origin: string;
    error?: string;
    metadata?: Record<string, unknown>;
}

const MAX_RECENT_EVENTS = 100;

/**
 * JSON-lines logger for analysis runs
 */
export class AnalysisLogger {
    private readonly logStream: fs.WriteStream | null;
    private readonly recentEvents: AnalysisLogEntry[] = [];

    /**
     * @param logFile - target file; under test nothing is written unless one is given
     */
    constructor(logFile?: string) {
        const target = logFile ?? (isTest
            ? undefined
            : path.join(process.env.DATA_DIR || path.resolve(process.cwd(), 'data'), 'analysis.log'));

        if (target) {
            ensureDirExistence(target);
            this.logStream = fs.createWriteStream(target, { flags: 'a' });
        } else {
            this.logStream = null;
        }
    }

    createRunContext(origin: string): RunContext {
        return {
            runId: randomUUID(),
            origin,
            startedAt: Date.now(),
        };
    }

    logAnalysisStart(context: RunContext): void {
        this.writeLogEntry({
            runId: context.runId,
            timestamp: context.startedAt,
            level: 'info',
            event: 'ANALYSIS_START',
            origin: context.origin,
        });
    }

    logAnalysisComplete(context: RunContext, report: AnalysisReport): void {
        const { statistics } = report.blockPlan;
        this.writeLogEntry({
            runId: context.runId,
            timestamp: Date.now(),
            level: statistics.highRisk > 0 ? 'warn' : 'info',
            event: 'ANALYSIS_COMPLETE',
            origin: context.origin,
            metadata: {
                processingTime: Date.now() - context.startedAt,
                ingestion: report.ingestion,
                totalSources: report.summary.totalSources,
                totalRequests: report.summary.totalRequests,
                suspiciousSources: report.suspiciousSources.length,
                suspiciousNetworks: report.suspiciousNetworks.length,
                highRisk: statistics.highRisk,
                mediumRisk: statistics.mediumRisk,
                networkBlocks: Object.keys(report.blockPlan.networkBlocks).length,
            },
        });
    }

    logAnalysisError(context: RunContext, error: Error): void {
        this.writeLogEntry({
            runId: context.runId,
            timestamp: Date.now(),
            level: 'error',
            event: 'ANALYSIS_ERROR',
            origin: context.origin,
            error: error.message,
            metadata: {
                errorName: error.name,
                stack: error.stack,
            },
        });
    }

    logReportWritten(report: AnalysisReport, filePath: string): void {
        this.writeLogEntry({
            runId: report.runId,
            timestamp: Date.now(),
            level: 'info',
            event: 'REPORT_WRITTEN',
            origin: report.origin,
            metadata: { filePath },
        });
    }

    /**
     * Most recent entries, oldest first
     */
    getRecentEvents(): AnalysisLogEntry[] {
        return [...this.recentEvents];
    }

    /**
     * Flush and close the log file
     */
    close(): Promise<void> {
        return new Promise(resolve => {
            if (!this.logStream) {
                resolve();
                return;
            }
            this.logStream.end(() => resolve());
        });
    }

    private writeLogEntry(entry: AnalysisLogEntry): void {
        this.recentEvents.push(entry);
        if (this.recentEvents.length > MAX_RECENT_EVENTS) {
            this.recentEvents.shift();
        }

        this.logStream?.write(JSON.stringify(entry) + '\n');

        if (process.env.NODE_ENV !== 'production' && !isTest) {
            const level = entry.level.toUpperCase();
            console.log(`[${new Date(entry.timestamp).toISOString()}] [${level}] ${entry.event} - ${entry.origin} - ${entry.runId}`);
        }
    }
}

let analysisLogger: AnalysisLogger | null = null;

export function getAnalysisLogger(): AnalysisLogger {
    if (!analysisLogger) {
        analysisLogger = new AnalysisLogger();
    }
    return analysisLogger;
}
