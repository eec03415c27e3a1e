const MIB = 1024 * 1024;
const GIB = 1024 * MIB;

export function formatCount(value: number): string {
    return Math.round(value).toLocaleString('en-US');
}

export function formatMiB(bytes: number): string {
    return `${(bytes / MIB).toFixed(1)} MiB`;
}

export function formatGiB(bytes: number): string {
    return `${(bytes / GIB).toFixed(1)} GiB`;
}

export function formatPercent(ratio: number): string {
    return `${(ratio * 100).toFixed(1)}%`;
}

export { MIB, GIB };
