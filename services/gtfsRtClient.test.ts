import { describe, expect, it, vi } from 'vitest';
import { deltaFeedBytes } from '../fixtures/deltaFeed';
import { scheduleStore } from '../fixtures/visits';
import type { TripRouteInfo } from '../types';
import { TransportError } from '../utils/errors';
import { createGtfsRtClient } from './gtfsRtClient';

const trip9001: TripRouteInfo = {
    tripId: 'ta9001',
    routeId: 'ta501',
    directionId: '1',
    routeShortName: '705',
    agencyId: '91',
    destinationCode: '20002',
};

const setup = (status = 200) => {
    let now = Date.parse('2024-05-03T19:10:05Z');
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(deltaFeedBytes(), { status }));
    const resolveTripsInfo = vi.fn(async (ids: readonly string[]) =>
        new Map<string, TripRouteInfo>(ids.includes('ta9001') ? [['ta9001', trip9001]] : []));
    const store = scheduleStore();
    const getMappedStopCodes = vi.spyOn(store, 'getMappedStopCodes');
    const client = createGtfsRtClient({
        url: 'http://feed.test/export',
        authKey: 'test-secret',
        store,
        resolveTripsInfo,
        fetchImpl,
        clock: () => now,
    });
    return { client, fetchImpl, resolveTripsInfo, getMappedStopCodes, advance: (ms: number) => { now += ms; } };
};

describe('createGtfsRtClient', () => {
    it('fetches the feed with the auth key and decodes visits', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { client, fetchImpl } = setup();

        const response = await client.request(['20001', '20002']);
        const [url, init] = fetchImpl.mock.calls[0];
        expect(url).toBe('http://feed.test/export');
        expect(init?.headers).toMatchObject({ authorization: 'test-secret' });
        expect(response.visitsFor('20001').map((v) => v.tripId)).toEqual(['ta9001']);
        expect(response.visitsFor('20002').map((v) => v.lineName)).toEqual(['705']);
    });

    it('reuses one snapshot while it is fresh', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { client, fetchImpl, advance } = setup();

        await Promise.all([client.request(['20001']), client.request(['20002'])]);
        expect(fetchImpl).toHaveBeenCalledTimes(1);

        advance(29_000);
        await client.request(['20001']);
        expect(fetchImpl).toHaveBeenCalledTimes(1);

        advance(1_000);
        await client.request(['20001']);
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('caches trip facts and stop mappings per id', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { client, resolveTripsInfo, getMappedStopCodes } = setup();

        await client.request(['20001']);
        expect(resolveTripsInfo).toHaveBeenCalledWith(['ta9001', 'ta9999']);
        expect(getMappedStopCodes).toHaveBeenCalledWith(['900', '901', '999']);

        await client.request(['20001']);
        // only the ids that found nothing are asked for again
        expect(resolveTripsInfo).toHaveBeenLastCalledWith(['ta9999']);
        expect(getMappedStopCodes).toHaveBeenLastCalledWith(['999']);
    });

    it('surfaces HTTP failures as TransportError', async () => {
        const { client } = setup(401);
        await expect(client.request(['20001'])).rejects.toThrow(TransportError);
    });
});
