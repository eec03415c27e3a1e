import { z } from 'zod';
import type { LogRecord } from '../analysis/types/LogRecord.js';
import { AnalysisErrorHandler, analysisErrorHandler } from '../analysis/ErrorHandler.js';

/**
 * One edge log line: sixteen whitespace-separated fields, the user agent and
 * the twelfth field quoted.
 */
const LOG_LINE_PATTERN = new RegExp(
    '^(\\d{14})\\s+(\\S+)\\s+(\\S+)\\s+(\\S+)\\s+' +
    '(\\d+)\\s+(\\d+)\\s+(\\d+)\\s+(\\d+)\\s+(\\S+)\\s+' +
    '(\\d+)\\s+"([^"]*)"\\s+"([^"]*)"\\s+(\\S+)\\s+' +
    '(\\S+)\\s+(\\S+)\\s+(\\d+)$'
);

const count = z.coerce.number().int().nonnegative().safe();

const edgeLogEntrySchema = z.object({
    timestamp: z.string().regex(/^\d{14}$/),
    address: z.string().min(1),
    domain: z.string().min(1),
    path: z.string().min(1),
    responseSize: count,
    processingTime: count,
    statusCode: count,
    referer: z.string(),
    userAgent: z.string(),
    method: z.string(),
    protocol: z.string(),
    cacheStatus: z.string(),
    trafficBytes: count,
});

/**
 * All fields of an edge log line the parser keeps
 */
export type EdgeLogEntry = z.infer<typeof edgeLogEntrySchema>;

export interface ParserStats {
    totalLines: number;
    parsedLines: number;
    /** Non-empty lines that did not match the format */
    rejectedLines: number;
}

/**
 * Parser for the fixed-schema edge log format
 */
export class LogParser {
    private stats: ParserStats = { totalLines: 0, parsedLines: 0, rejectedLines: 0 };

    constructor(private readonly errorHandler: AnalysisErrorHandler = analysisErrorHandler) {}

    /**
     * Parse one line into a full entry; null for blank or malformed lines
     */
    parseEntry(line: string): EdgeLogEntry | null {
        const trimmed = line.trim();
        if (!trimmed) {
            return null;
        }

        const match = LOG_LINE_PATTERN.exec(trimmed);
        if (!match) {
            return null;
        }

        const result = edgeLogEntrySchema.safeParse({
            timestamp: match[1],
            address: match[2],
            domain: match[3],
            path: match[4],
            responseSize: match[5],
            processingTime: match[6],
            statusCode: match[8],
            referer: match[9],
            userAgent: match[11],
            method: match[13],
            protocol: match[14],
            cacheStatus: match[15],
            trafficBytes: match[16],
        });

        return result.success ? result.data : null;
    }

    /**
     * Parse one line into a record, counting it in the parser statistics
     */
    parseLine(line: string): LogRecord | null {
        if (!line.trim()) {
            return null;
        }

        this.stats.totalLines++;
        const entry = this.parseEntry(line);
        if (!entry) {
            this.stats.rejectedLines++;
            this.errorHandler.handleUnparseableLine();
            return null;
        }

        this.stats.parsedLines++;
        return toLogRecord(entry);
    }

    /**
     * Lazily parse a sequence of lines, skipping the ones that do not parse
     */
    *parseLines(lines: Iterable<string>): Generator<LogRecord> {
        for (const line of lines) {
            const record = this.parseLine(line);
            if (record) {
                yield record;
            }
        }
    }

    getStats(): ParserStats {
        return { ...this.stats };
    }

    resetStats(): void {
        this.stats = { totalLines: 0, parsedLines: 0, rejectedLines: 0 };
    }
}

/**
 * The record the analysis consumes; its byte count is the delivered traffic
 */
export function toLogRecord(entry: EdgeLogEntry): LogRecord {
    return {
        timestamp: entry.timestamp,
        source: entry.address,
        domain: entry.domain,
        path: entry.path,
        statusCode: entry.statusCode,
        bytes: entry.trafficBytes,
        userAgent: entry.userAgent,
    };
}
