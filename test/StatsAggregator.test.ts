import { StatsAggregator } from '../src/analysis/StatsAggregator';
import { AnalysisErrorHandler, AnalysisErrorType, IngestionError } from '../src/analysis/ErrorHandler';
import { getRequestsPerHour } from '../src/analysis/stats/sourceStats';
import type { LogRecord } from '../src/analysis/types/LogRecord';
import { makeRecord, repeatRecord } from './fixtures/records';

function mixedTraffic(): LogRecord[] {
    return [
        makeRecord({ source: '203.0.113.10', path: '/a', bytes: 100 }),
        makeRecord({ source: '203.0.113.10', path: '/b', bytes: 200, timestamp: '20240301130500' }),
        makeRecord({ source: '203.0.113.11', statusCode: 404, bytes: 50 }),
        makeRecord({ source: '203.0.114.1', bytes: 10, timestamp: '20240302031000' }),
        makeRecord({ source: '2001:db8:1:2::10', bytes: 70 }),
        makeRecord({ source: '2001:db8:1:3::20', bytes: 30, userAgent: 'curl/8.0' }),
        makeRecord({ source: 'unknown', bytes: 5 }),
    ];
}

describe('StatsAggregator', () => {
    let errorHandler: AnalysisErrorHandler;
    let aggregator: StatsAggregator;

    beforeEach(() => {
        errorHandler = new AnalysisErrorHandler();
        aggregator = new StatsAggregator(errorHandler);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('ingest', () => {
        it('should accumulate per-source statistics', () => {
            aggregator.ingest(makeRecord({ path: '/a', bytes: 100, timestamp: '20240301123000' }));
            aggregator.ingest(makeRecord({ path: '/b', bytes: 200, statusCode: 404, timestamp: '20240301120000' }));

            const stats = aggregator.snapshot().sources.get('203.0.113.10');
            expect(stats).toBeDefined();
            if (!stats) return;

            expect(stats.requestCount).toBe(2);
            expect(stats.totalBytes).toBe(300);
            expect([...stats.paths]).toEqual(['/a', '/b']);
            expect(stats.statusCodes).toEqual(new Map([[200, 1], [404, 1]]));
            expect(stats.hourlyRequests).toEqual(new Map([['2024030112', 2]]));
            expect(stats.firstSeen).toBe(Date.UTC(2024, 2, 1, 12, 0, 0));
            expect(stats.lastSeen).toBe(Date.UTC(2024, 2, 1, 12, 30, 0));
            // half an hour apart, the span counts as one hour
            expect(getRequestsPerHour(stats)).toBe(2);
        });

        it('should roll every address up into both blocks of its family', () => {
            expect(aggregator.ingest(makeRecord({ source: '203.0.113.10' }))).toBe('applied');
            expect(aggregator.ingest(makeRecord({ source: '2001:db8:abcd:12::1' }))).toBe('applied');

            const networks = aggregator.snapshot().networks;
            expect([...networks.keys()]).toEqual([
                'IPv4/24_203.0.113.0/24',
                'IPv4/16_203.0.0.0/16',
                'IPv6/64_2001:db8:abcd:12::/64',
                'IPv6/48_2001:db8:abcd::/48',
            ]);
        });

        it('should count a repeated address once per network', () => {
            aggregator.ingest(makeRecord({ source: '203.0.113.10', bytes: 10 }));
            aggregator.ingest(makeRecord({ source: '203.0.113.10', bytes: 20 }));
            aggregator.ingest(makeRecord({ source: '203.0.113.99', bytes: 30 }));

            const network = aggregator.snapshot().networks.get('IPv4/24_203.0.113.0/24');
            expect(network?.memberCount).toBe(2);
            expect(network?.members).toEqual(new Set(['203.0.113.10', '203.0.113.99']));
            expect(network?.totalRequests).toBe(3);
            expect(network?.totalBytes).toBe(60);
        });

        it('should keep source statistics but skip networks for non-IP sources', () => {
            expect(aggregator.ingest(makeRecord({ source: 'unknown' }))).toBe('source-only');

            const snapshot = aggregator.snapshot();
            expect(snapshot.sources.get('unknown')?.requestCount).toBe(1);
            expect(snapshot.networks.size).toBe(0);
            expect(aggregator.getNetworkSkippedCount()).toBe(1);
            expect(errorHandler.getErrorCount(AnalysisErrorType.INVALID_ADDRESS)).toBe(1);
        });

        it('should treat an empty source address as source-only', () => {
            expect(aggregator.ingest(makeRecord({ source: '' }))).toBe('source-only');

            const snapshot = aggregator.snapshot();
            expect(snapshot.sources.get('')?.requestCount).toBe(1);
            expect(snapshot.networks.size).toBe(0);
            expect(aggregator.getNetworkSkippedCount()).toBe(1);
        });

        it.each([
            ['timestamp', { timestamp: '2024-03-01 12:00' }],
            ['timestamp', { timestamp: '20240230120000' }],
            ['bytes', { bytes: -1 }],
            ['bytes', { bytes: 1.5 }],
            ['statusCode', { statusCode: Number.NaN }],
        ])('should reject an invalid %s without changing state', (field, overrides) => {
            aggregator.ingest(makeRecord());

            let thrown: unknown;
            try {
                aggregator.ingest(makeRecord(overrides));
            } catch (error) {
                thrown = error;
            }

            expect(thrown).toBeInstanceOf(IngestionError);
            if (thrown instanceof IngestionError) {
                expect(thrown.code).toBe('INVALID_RECORD');
                expect(thrown.field).toBe(field);
            }

            const snapshot = aggregator.snapshot();
            expect(snapshot.sources.size).toBe(1);
            expect(snapshot.sources.get('203.0.113.10')?.requestCount).toBe(1);
            expect(snapshot.networks.get('IPv4/24_203.0.113.0/24')?.totalRequests).toBe(1);
        });

        it('should refuse records once a snapshot was taken', () => {
            aggregator.ingest(makeRecord());
            aggregator.snapshot();

            expect(aggregator.isSealed()).toBe(true);
            expect(() => aggregator.ingest(makeRecord())).toThrow(
                expect.objectContaining({ code: 'AGGREGATOR_SEALED' })
            );
        });

        it('should never decrease counters as records arrive', () => {
            let previous = { requests: 0, bytes: 0, paths: 0, members: 0 };

            for (const record of mixedTraffic()) {
                aggregator.ingest(record);
                const snapshot = aggregator.snapshot();
                // snapshot seals; continue on a merged copy
                aggregator = aggregator.merge(new StatsAggregator(errorHandler));

                let requests = 0;
                let bytes = 0;
                let paths = 0;
                for (const stats of snapshot.sources.values()) {
                    requests += stats.requestCount;
                    bytes += stats.totalBytes;
                    paths += stats.paths.size;
                }
                let members = 0;
                for (const network of snapshot.networks.values()) {
                    members += network.memberCount;
                }

                expect(requests).toBeGreaterThanOrEqual(previous.requests);
                expect(bytes).toBeGreaterThanOrEqual(previous.bytes);
                expect(paths).toBeGreaterThanOrEqual(previous.paths);
                expect(members).toBeGreaterThanOrEqual(previous.members);
                previous = { requests, bytes, paths, members };
            }
        });
    });

    describe('ingestAll', () => {
        it('should count accepted, rejected and network-skipped records', async () => {
            const result = await aggregator.ingestAll([
                makeRecord(),
                makeRecord({ bytes: -5 }),
                makeRecord({ source: 'unknown' }),
            ]);

            expect(result).toEqual({ accepted: 2, rejected: 1, networkSkipped: 1, aborted: false });
            expect(errorHandler.getErrorCount(AnalysisErrorType.INVALID_RECORD)).toBe(1);
        });

        it('should conserve requests and bytes across sources and networks', async () => {
            const records = mixedTraffic();
            await aggregator.ingestAll(records);
            const snapshot = aggregator.snapshot();

            const summary = aggregator.summary();
            expect(summary.totalRequests).toBe(records.length);
            expect(summary.totalBytes).toBe(records.reduce((sum, record) => sum + record.bytes, 0));

            for (const stats of snapshot.sources.values()) {
                const statusTotal = [...stats.statusCodes.values()].reduce((a, b) => a + b, 0);
                const hourlyTotal = [...stats.hourlyRequests.values()].reduce((a, b) => a + b, 0);
                expect(statusTotal).toBe(stats.requestCount);
                expect(hourlyTotal).toBe(stats.requestCount);
            }

            const ipv4Requests = records.filter((record) => record.source.includes('.')).length;
            const ipv6Requests = records.filter((record) => record.source.includes(':')).length;
            const requestsAt = (granularity: string) =>
                [...snapshot.networks.values()]
                    .filter((network) => network.granularity === granularity)
                    .reduce((sum, network) => sum + network.totalRequests, 0);

            expect(requestsAt('IPv4/24')).toBe(ipv4Requests);
            expect(requestsAt('IPv4/16')).toBe(ipv4Requests);
            expect(requestsAt('IPv6/64')).toBe(ipv6Requests);
            expect(requestsAt('IPv6/48')).toBe(ipv6Requests);
        });

        it('should stop when the signal is aborted between records', async () => {
            const controller = new AbortController();
            async function* stream(): AsyncGenerator<LogRecord> {
                yield makeRecord();
                yield makeRecord();
                controller.abort();
                yield makeRecord();
            }

            const result = await aggregator.ingestAll(stream(), { signal: controller.signal });

            expect(result.accepted).toBe(2);
            expect(result.aborted).toBe(true);
            expect(aggregator.summary().totalRequests).toBe(2);
        });
    });

    describe('summary', () => {
        it('should be all zero for an empty run', () => {
            expect(aggregator.summary()).toEqual({
                totalSources: 0,
                totalRequests: 0,
                totalBytes: 0,
                totalMiB: 0,
                totalGiB: 0,
                averageRequestsPerSource: 0,
                averageBytesPerSource: 0,
            });
        });

        it('should average over distinct sources', async () => {
            await aggregator.ingestAll([
                ...repeatRecord(3, { source: '192.0.2.1', bytes: 1024 * 1024 }),
                makeRecord({ source: '192.0.2.2', bytes: 1024 * 1024 }),
            ]);

            expect(aggregator.summary()).toMatchObject({
                totalSources: 2,
                totalRequests: 4,
                totalMiB: 4,
                averageRequestsPerSource: 2,
                averageBytesPerSource: 2 * 1024 * 1024,
            });
        });
    });

    describe('timePatterns', () => {
        it('should sum requests per hour of day and per day', async () => {
            await aggregator.ingestAll([
                makeRecord({ timestamp: '20240301120000' }),
                makeRecord({ source: '192.0.2.1', timestamp: '20240301125959' }),
                makeRecord({ timestamp: '20240302031000' }),
            ]);

            const patterns = aggregator.timePatterns();
            expect(patterns.hourOfDay).toHaveLength(24);
            expect(patterns.hourOfDay[12]).toBe(2);
            expect(patterns.hourOfDay[3]).toBe(1);
            expect(patterns.daily).toEqual({ '20240301': 2, '20240302': 1 });
        });
    });

    describe('top lists', () => {
        it('should rank sources by requests and by bytes', async () => {
            await aggregator.ingestAll([
                ...repeatRecord(3, { source: '192.0.2.1', bytes: 10 }),
                makeRecord({ source: '192.0.2.2', bytes: 5000 }),
                ...repeatRecord(2, { source: '192.0.2.3', bytes: 10 }),
            ]);

            expect(aggregator.topSourcesByRequests(2).map((stats) => stats.address)).toEqual(['192.0.2.1', '192.0.2.3']);
            expect(aggregator.topSourcesByBytes(1).map((stats) => stats.address)).toEqual(['192.0.2.2']);
        });

        it('should rank networks by members, then by requests', async () => {
            await aggregator.ingestAll([
                makeRecord({ source: '198.51.100.1' }),
                makeRecord({ source: '198.51.100.2' }),
                ...repeatRecord(5, { source: '192.0.2.1' }),
            ]);

            expect(aggregator.topNetworks(4).map((network) => network.key)).toEqual([
                'IPv4/24_198.51.100.0/24',
                'IPv4/16_198.51.0.0/16',
                'IPv4/24_192.0.2.0/24',
                'IPv4/16_192.0.0.0/16',
            ]);
        });
    });

    describe('merge', () => {
        it('should equal a single aggregator over the same records', async () => {
            const records = mixedTraffic();
            const left = new StatsAggregator(errorHandler);
            const right = new StatsAggregator(errorHandler);
            await left.ingestAll(records.filter((_, index) => index % 2 === 0));
            await right.ingestAll(records.filter((_, index) => index % 2 === 1));
            await aggregator.ingestAll(records);

            const merged = left.merge(right);

            expect(merged.summary()).toEqual(aggregator.summary());
            expect(merged.getNetworkSkippedCount()).toBe(1);
            const expected = aggregator.snapshot();
            const actual = merged.snapshot();
            expect(new Set(actual.sources.keys())).toEqual(new Set(expected.sources.keys()));
            for (const [address, stats] of expected.sources) {
                expect(actual.sources.get(address)).toEqual(stats);
            }
            for (const [key, stats] of expected.networks) {
                expect(actual.networks.get(key)).toEqual(stats);
            }
        });

        it('should be commutative', async () => {
            const left = new StatsAggregator(errorHandler);
            const right = new StatsAggregator(errorHandler);
            await left.ingestAll([makeRecord({ path: '/a', timestamp: '20240301130000' })]);
            await right.ingestAll([makeRecord({ path: '/b', timestamp: '20240301110000' })]);

            const leftFirst = left.merge(right).snapshot().sources.get('203.0.113.10');
            const rightFirst = right.merge(left).snapshot().sources.get('203.0.113.10');

            expect(leftFirst).toEqual(rightFirst);
            expect(leftFirst?.firstSeen).toBe(Date.UTC(2024, 2, 1, 11, 0, 0));
            expect(leftFirst?.lastSeen).toBe(Date.UTC(2024, 2, 1, 13, 0, 0));
        });

        it('should leave its inputs untouched', async () => {
            const left = new StatsAggregator(errorHandler);
            const right = new StatsAggregator(errorHandler);
            await left.ingestAll([makeRecord({ path: '/a' })]);
            await right.ingestAll([makeRecord({ path: '/b' })]);

            left.merge(right);

            const stats = left.snapshot().sources.get('203.0.113.10');
            expect(stats?.requestCount).toBe(1);
            expect(stats?.paths).toEqual(new Set(['/a']));
            expect(right.isSealed()).toBe(false);
        });
    });

    describe('sharded ingestion', () => {
        it('should place an address in the same shard every time', () => {
            const shard = StatsAggregator.shardForAddress('203.0.113.10', 4);
            expect(shard).toBeGreaterThanOrEqual(0);
            expect(shard).toBeLessThan(4);
            expect(StatsAggregator.shardForAddress('203.0.113.10', 4)).toBe(shard);
        });

        it('should produce the same statistics as unsharded ingestion', async () => {
            const records = [...mixedTraffic(), makeRecord({ bytes: -1 })];
            const unsharded = await aggregator.ingestAll(records);
            const { aggregator: sharded, result } = await StatsAggregator.ingestSharded(records, 3, { errorHandler });

            expect(result).toEqual(unsharded);
            expect(sharded.summary()).toEqual(aggregator.summary());
            const expected = aggregator.snapshot();
            const actual = sharded.snapshot();
            expect(actual.sources.size).toBe(expected.sources.size);
            expect(actual.networks.size).toBe(expected.networks.size);
            for (const [key, stats] of expected.networks) {
                expect(actual.networks.get(key)).toEqual(stats);
            }
        });

        it('should reject a non-positive shard count', async () => {
            await expect(StatsAggregator.ingestSharded([], 0)).rejects.toThrow(RangeError);
        });
    });
});
