import fs from 'fs';
import path from 'path';
import readline from 'readline';
import zlib from 'zlib';
import type { LogRecord } from '../analysis/types/LogRecord.js';
import { AnalysisErrorHandler, analysisErrorHandler } from '../analysis/ErrorHandler.js';
import { LogParser } from './LogParser.js';

const PROGRESS_INTERVAL = 10_000;

export interface LogFileReaderOptions {
    parser?: LogParser;
    errorHandler?: AnalysisErrorHandler;
    /** Log a progress line every this many records */
    progressInterval?: number;
}

/**
 * Streams records out of a directory of gzip-compressed edge logs
 */
export class LogFileReader {
    private readonly parser: LogParser;
    private readonly errorHandler: AnalysisErrorHandler;
    private readonly progressInterval: number;

    constructor(options: LogFileReaderOptions = {}) {
        this.errorHandler = options.errorHandler ?? analysisErrorHandler;
        this.parser = options.parser ?? new LogParser(this.errorHandler);
        this.progressInterval = options.progressInterval ?? PROGRESS_INTERVAL;
    }

    /**
     * Sorted paths of the `.gz` files in a directory; empty when it is missing
     */
    async findLogFiles(dir: string): Promise<string[]> {
        if (!fs.existsSync(dir)) {
            console.warn(`Log directory ${dir} does not exist`);
            return [];
        }

        const entries = await fs.promises.readdir(dir, { withFileTypes: true });
        const files = entries
            .filter(entry => entry.isFile() && entry.name.endsWith('.gz'))
            .map(entry => path.join(dir, entry.name))
            .sort();

        console.log(`Found ${files.length} log files in ${dir}`);
        return files;
    }

    /**
     * Records of one gzip file, in file order
     */
    async *readFile(filePath: string): AsyncGenerator<LogRecord> {
        const source = fs.createReadStream(filePath);
        const gunzip = zlib.createGunzip();
        source.on('error', error => gunzip.destroy(error));
        source.pipe(gunzip);

        const lines = readline.createInterface({
            input: gunzip,
            crlfDelay: Infinity,
        });
        // A corrupt archive ends the line stream; the error is rethrown below
        let streamError: Error | null = null;
        gunzip.on('error', error => {
            streamError = error;
            lines.close();
        });

        let lineCount = 0;
        let parsedCount = 0;
        try {
            for await (const line of lines) {
                lineCount++;
                const record = this.parser.parseLine(line);
                if (record) {
                    parsedCount++;
                    yield record;
                }
            }
        } finally {
            source.destroy();
            gunzip.destroy();
        }

        if (streamError !== null) {
            throw streamError;
        }

        console.log(`${path.basename(filePath)}: ${parsedCount}/${lineCount} records parsed`);
    }

    /**
     * Records of every log file in a directory. A file that fails mid-way is
     * reported and the remaining files are still read.
     */
    async *readDirectory(dir: string): AsyncGenerator<LogRecord> {
        let total = 0;

        for (const filePath of await this.findLogFiles(dir)) {
            try {
                for await (const record of this.readFile(filePath)) {
                    total++;
                    yield record;

                    if (total % this.progressInterval === 0) {
                        console.log(`Processed ${total} records...`);
                    }
                }
            } catch (error) {
                this.errorHandler.handleFileReadError(filePath, error);
            }
        }

        console.log(`Read ${total} records from ${dir}`);
    }

    getParser(): LogParser {
        return this.parser;
    }
}
