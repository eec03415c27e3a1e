import type { LogRecord } from './types/LogRecord.js';

/**
 * Error types for the analysis pipeline
 */
export enum AnalysisErrorType {
    INVALID_RECORD = 'INVALID_RECORD',
    INVALID_ADDRESS = 'INVALID_ADDRESS',
    UNPARSEABLE_LINE = 'UNPARSEABLE_LINE',
    FILE_READ_ERROR = 'FILE_READ_ERROR',
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export type IngestionErrorCode = 'INVALID_RECORD' | 'AGGREGATOR_SEALED';

/**
 * Raised when a record cannot be applied. The aggregator's state is never
 * touched by a record that raises.
 */
export class IngestionError extends Error {
    constructor(message: string, public readonly code: IngestionErrorCode, public readonly field?: string) {
        super(message);
        this.name = 'IngestionError';
    }
}

/**
 * Counts and reports the recoverable failures of analysis runs
 */
export class AnalysisErrorHandler {
    private readonly errorCounts: Map<AnalysisErrorType, number> = new Map();
    private readonly lastErrors: Map<AnalysisErrorType, number> = new Map();

    /**
     * Record a rejected record
     */
    handleInvalidRecord(record: LogRecord, error: Error): void {
        this.recordError(AnalysisErrorType.INVALID_RECORD);
        console.warn(`Rejected record from ${record.source} at ${record.timestamp}:`, error.message);
    }

    /**
     * Record an address that could not be rolled up into networks. Not logged
     * per record; a run can carry many of them.
     */
    handleInvalidAddress(): void {
        this.recordError(AnalysisErrorType.INVALID_ADDRESS);
    }

    /**
     * Record a log line that did not match the edge log format
     */
    handleUnparseableLine(): void {
        this.recordError(AnalysisErrorType.UNPARSEABLE_LINE);
    }

    /**
     * Record a log file that could not be read to the end
     */
    handleFileReadError(filePath: string, error: unknown): void {
        this.recordError(AnalysisErrorType.FILE_READ_ERROR);
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Failed to read log file ${filePath}:`, message);
    }

    /**
     * Record an invalid configuration value
     */
    handleConfigurationError(error: Error): void {
        this.recordError(AnalysisErrorType.CONFIGURATION_ERROR);
        console.error('Invalid analysis configuration:', error.message);
    }

    /**
     * Record error occurrence for monitoring
     */
    private recordError(errorType: AnalysisErrorType): void {
        const currentCount = this.errorCounts.get(errorType) ?? 0;
        this.errorCounts.set(errorType, currentCount + 1);
        this.lastErrors.set(errorType, Date.now());
    }

    /**
     * Get error statistics
     */
    getErrorStats(): {
        errorCounts: Record<string, number>;
        lastErrors: Record<string, number>;
    } {
        return {
            errorCounts: Object.fromEntries(this.errorCounts),
            lastErrors: Object.fromEntries(this.lastErrors),
        };
    }

    getErrorCount(errorType: AnalysisErrorType): number {
        return this.errorCounts.get(errorType) ?? 0;
    }

    /**
     * Reset error statistics
     */
    resetErrorStats(): void {
        this.errorCounts.clear();
        this.lastErrors.clear();
    }
}

// Export singleton instance
export const analysisErrorHandler = new AnalysisErrorHandler();
