import fs from 'fs';
import path from 'path';
import type { AnalysisReport } from '../analysis/types/Report.js';
import { ensureDirExistence } from '../utils/ensureDirExistence.js';
import { AnalysisLogger, getAnalysisLogger } from '../utils/logger/analysisLogger.js';
import { serializeReport } from './serializeReport.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function formatReportTimestamp(date: Date): string {
    const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
    return `${day}_${time}`;
}

export interface ReportWriterOptions {
    /** Target directory, defaults to REPORT_DIR or `./reports` */
    dir?: string;
    /** Whether to include the full per-source snapshot */
    includeSnapshot?: boolean;
    logger?: AnalysisLogger;
}

/**
 * Writes analysis reports as pretty-printed JSON files
 */
export class ReportWriter {
    private readonly dir: string;
    private readonly includeSnapshot: boolean;
    private readonly logger: AnalysisLogger;

    constructor(options: ReportWriterOptions = {}) {
        this.dir = options.dir ?? (process.env.REPORT_DIR || path.resolve(process.cwd(), 'reports'));
        this.includeSnapshot = options.includeSnapshot ?? true;
        this.logger = options.logger ?? getAnalysisLogger();
    }

    /**
     * Path a report is written to, derived from its generation time
     */
    reportPath(report: AnalysisReport): string {
        const stamp = formatReportTimestamp(new Date(report.generatedAt));
        return path.join(this.dir, `edge-analysis-report-${stamp}.json`);
    }

    async write(report: AnalysisReport): Promise<string> {
        const filePath = this.reportPath(report);
        ensureDirExistence(filePath);

        const content = JSON.stringify(serializeReport(report, { includeSnapshot: this.includeSnapshot }), null, 2);
        await fs.promises.writeFile(filePath, content + '\n', 'utf-8');

        console.log(`Analysis report written to ${filePath}`);
        this.logger.logReportWritten(report, filePath);
        return filePath;
    }
}
