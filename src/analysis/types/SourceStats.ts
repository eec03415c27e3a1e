/**
 * Running traffic statistics for a single source address.
 *
 * `requestCount` always equals the sum of `statusCodes` and the sum of
 * `hourlyRequests`; the sets only ever grow.
 */
export interface SourceStats {
    readonly address: string;
    readonly requestCount: number;
    readonly totalBytes: number;
    readonly paths: ReadonlySet<string>;
    readonly userAgents: ReadonlySet<string>;
    readonly domains: ReadonlySet<string>;
    /** Request count per HTTP status code */
    readonly statusCodes: ReadonlyMap<number, number>;
    /** Request count per hour bucket (`YYYYMMDDHH`) */
    readonly hourlyRequests: ReadonlyMap<string, number>;
    /** Epoch milliseconds of the earliest request, null before the first one */
    readonly firstSeen: number | null;
    /** Epoch milliseconds of the latest request, null before the first one */
    readonly lastSeen: number | null;
}
