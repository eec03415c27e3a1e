/**
 * Decoded edge access-log record. Produced by the log parser (or any other
 * decoder) and consumed read-only by the statistics aggregator.
 */
export interface LogRecord {
    /** Request time as `YYYYMMDDHHMMSS` */
    readonly timestamp: string;
    /** Textual IPv4 or IPv6 client address */
    readonly source: string;
    readonly domain: string;
    readonly path: string;
    readonly statusCode: number;
    /** Bytes delivered to the client */
    readonly bytes: number;
    readonly userAgent: string;
}
