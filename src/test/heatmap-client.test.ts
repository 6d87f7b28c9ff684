import { describe, it, expect, jest } from '@jest/globals';
import { HeatMapClient } from '../heatmap/client.js';
import { UnknownStationError, UpstreamError } from '../errors.js';
import { fakeHttp, latestCollection, timeseriesValues } from './fixtures.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

describe('HeatMapClient', () => {
    describe('fetchLatest', () => {
        it('issues one GET to /latest and returns the body', async () => {
            const { http, requests } = fakeHttp(() => ({ data: latestCollection() }));
            const client = new HeatMapClient({ http });

            await expect(client.fetchLatest()).resolves.toEqual(latestCollection());
            expect(requests).toHaveLength(1);
            expect(requests[0].method).toBe('get');
            expect(requests[0].url).toBe('/latest');
        });

        it('surfaces a non-success status', async () => {
            const { http, requests } = fakeHttp(() => ({ status: 503, data: 'Service Unavailable' }));
            const client = new HeatMapClient({ http });

            const error = await client.fetchLatest().catch((e: unknown) => e);
            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({
                upstreamStatus: 503,
                status: 502,
                message: 'Request to /latest failed with status code 503',
            });
            expect(requests).toHaveLength(1);
        });

        it('surfaces network failures without retrying', async () => {
            const { http, requests } = fakeHttp(() => ({ error: new Error('connect ECONNREFUSED') }));
            const client = new HeatMapClient({ http });

            await expect(client.fetchLatest()).rejects.toThrow('Request to /latest failed: connect ECONNREFUSED');
            expect(requests).toHaveLength(1);
        });
    });

    describe('fetchTimeseries', () => {
        it('forwards stationId and the time range as query parameters', async () => {
            const { http, requests } = fakeHttp(() => ({ data: timeseriesValues() }));
            const client = new HeatMapClient({ http });

            await client.fetchTimeseries({
                stationId: '11117',
                timeFrom: '2024-11-01T00:00:00Z',
                timeTo: '2024-11-05T00:00:00Z',
            });

            expect(requests[0].url).toBe('/timeseries');
            expect(requests[0].params).toEqual({
                stationId: '11117',
                timeFrom: '2024-11-01T00:00:00Z',
                timeTo: '2024-11-05T00:00:00Z',
            });
        });

        it('omits absent time bounds', async () => {
            const { http, requests } = fakeHttp(() => ({ data: [] }));
            const client = new HeatMapClient({ http });

            await client.fetchTimeseries({ stationId: '11117' });
            expect(requests[0].params).toEqual({ stationId: '11117' });
        });

        it('treats 204 and an empty body as no readings', async () => {
            const noContent = new HeatMapClient({ http: fakeHttp(() => ({ status: 204 })).http });
            const emptyBody = new HeatMapClient({ http: fakeHttp(() => ({ status: 200, data: '  ' })).http });

            await expect(noContent.fetchTimeseries({ stationId: '11117' })).resolves.toEqual([]);
            await expect(emptyBody.fetchTimeseries({ stationId: '11117' })).resolves.toEqual([]);
        });

        it('reports 404 as an unknown station', async () => {
            const { http } = fakeHttp(() => ({ status: 404, data: { message: 'not found' } }));
            const client = new HeatMapClient({ http });

            const error = await client.fetchTimeseries({ stationId: '99999' }).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(UnknownStationError);
            expect(error).toMatchObject({ stationId: '99999', status: 404, message: 'Unknown station: 99999' });
        });

        it('reports other error statuses as upstream failures', async () => {
            const { http } = fakeHttp(() => ({ status: 500 }));
            const client = new HeatMapClient({ http });

            await expect(client.fetchTimeseries({ stationId: '11117' })).rejects.toBeInstanceOf(UpstreamError);
        });
    });
});
