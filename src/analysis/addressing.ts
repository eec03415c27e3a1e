import * as ipaddr from 'ipaddr.js';
import type { AddressFamily, Granularity } from './types/NetworkStats.js';

/**
 * Prefix lengths tracked for every source during aggregation, two per family
 */
export const AGGREGATION_PREFIXES: Readonly<Record<AddressFamily, readonly number[]>> = {
    IPv4: [24, 16],
    IPv6: [64, 48],
};

/**
 * Prefix length high-risk sources are grouped by when suggesting whole-block
 * actions. Deliberately separate from AGGREGATION_PREFIXES.
 */
export const BLOCK_SUGGESTION_PREFIXES: Readonly<Record<AddressFamily, number>> = {
    IPv4: 24,
    IPv6: 64,
};

export type ParsedAddress =
    | { family: 'IPv4'; address: ipaddr.IPv4 }
    | { family: 'IPv6'; address: ipaddr.IPv6 };

/**
 * Parse a textual address, returning null when it is neither a dotted-quad
 * IPv4 nor an IPv6 address
 */
export function parseAddress(address: string): ParsedAddress | null {
    if (ipaddr.IPv4.isValidFourPartDecimal(address)) {
        return { family: 'IPv4', address: ipaddr.IPv4.parse(address) };
    }
    if (ipaddr.IPv6.isValid(address)) {
        return { family: 'IPv6', address: ipaddr.IPv6.parse(address) };
    }
    return null;
}

/**
 * CIDR string of the block of the given prefix length containing the address
 */
export function containingBlock(parsed: ParsedAddress, prefixLength: number): string {
    const cidr = `${parsed.address.toString()}/${prefixLength}`;
    const network = parsed.family === 'IPv4'
        ? ipaddr.IPv4.networkAddressFromCIDR(cidr).toString()
        : ipaddr.IPv6.networkAddressFromCIDR(cidr).toRFC5952String();

    return `${network}/${prefixLength}`;
}

/**
 * Granularity tag for a family and prefix length, e.g. `IPv4/24`
 */
export function granularityOf(family: AddressFamily, prefixLength: number): Granularity {
    return `${family}/${prefixLength}`;
}
