/**
 * Address family of a source, as far as network rollups are concerned
 */
export type AddressFamily = 'IPv4' | 'IPv6';

/**
 * Granularity tag of a network rollup, e.g. `IPv4/24` or `IPv6/48`
 */
export type Granularity = `${AddressFamily}/${number}`;

/**
 * Aggregate statistics for one network block at one granularity.
 */
export interface NetworkStats {
    /** Map key, `<granularity>_<cidr>` */
    readonly key: string;
    readonly granularity: Granularity;
    /** Network in CIDR notation, e.g. `203.0.113.0/24` */
    readonly cidr: string;
    /** Distinct member addresses seen in this block */
    readonly members: ReadonlySet<string>;
    /** Always `members.size`; repeated addresses are never counted twice */
    readonly memberCount: number;
    readonly totalRequests: number;
    readonly totalBytes: number;
}
