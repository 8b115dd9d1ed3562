import { describe, expect, it, vi } from 'vitest';
import { scheduleStore } from '../fixtures/visits';
import { createScheduleQueries } from './scheduleQueries';
import { createTranslator } from './translations';

const setup = (clock = () => 0) => {
    const store = scheduleStore();
    const translator = createTranslator({ store, clock });
    return { store, queries: createScheduleQueries({ store, translator, clock }) };
};

describe('createScheduleQueries', () => {
    describe('getStopInfo', () => {
        it('returns the translated name, address and location of a stop code', async () => {
            const { queries } = setup();

            expect(await queries.getStopInfo('21470')).toEqual({
                name: { EN: 'Tel Aviv Central Station', HE: 'ת. מרכזית ת"א' },
                address: { street: 'לוינסקי 108', city: 'Tel Aviv-Yafo', platform: '7', floor: '6' },
                location: { lat: 32.0561, lon: 34.7795 },
            });
        });

        it('returns null for an unknown code', async () => {
            const { queries } = setup();
            expect(await queries.getStopInfo('00000')).toBeNull();
        });

        it('caches the lookup until the stop info TTL runs out', async () => {
            let now = 0;
            const { store, queries } = setup(() => now);
            const lookup = vi.spyOn(store, 'getStopByCode');

            await queries.getStopInfo('12345');
            await queries.getStopInfo('12345');
            expect(lookup).toHaveBeenCalledTimes(1);

            now = 15 * 60 * 1000;
            await queries.getStopInfo('12345');
            expect(lookup).toHaveBeenCalledTimes(2);
        });
    });

    it('lists the routes of an operator by short name in route id order', async () => {
        const { queries } = setup();

        const routes = await queries.getRoutes('3', '480');
        expect(routes.map((r) => r.routeId)).toEqual(['10938', '10939']);
        expect(await queries.getRoutes('5', '480')).toEqual([]);
    });

    describe('getRouteStops', () => {
        it('lists the stops of a route in travel order', async () => {
            const { queries } = setup();

            const stops = await queries.getRouteStops('10938');
            expect(stops?.map((s) => [s.stop.stopCode, s.sequence])).toEqual([['21470', 1], ['12345', 2]]);
            expect(stops?.[1].name).toEqual({ EN: 'Jerusalem Central Station', HE: 'ת. מרכזית ירושלים' });
            expect(stops?.[1].address.city).toBe('Jerusalem');
        });

        it('returns null when the route has no trips in that direction', async () => {
            const { queries } = setup();
            expect(await queries.getRouteStops('10939', 0)).toBeNull();
            expect(await queries.getRouteStops('unknown')).toBeNull();
        });
    });

    it('counts distinct licenses rather than route rows', async () => {
        const { queries } = setup();
        expect(await queries.countRoutes('3')).toBe(1);
        expect(await queries.countRoutes('999')).toBe(0);
    });

    it('lists rail stations once each, naming them from the settlement table without a translation', async () => {
        const { queries } = setup();

        expect(await queries.getRailStations()).toEqual([
            { code: '37358', name: { EN: 'Jerusalem', HE: 'ירושלים' } },
            { code: '17038', name: { HE: 'חיפה', EN: 'Haifa' } },
        ]);
        expect(await queries.getRailStations('999')).toEqual([]);
    });

    it('finds stops within the radius, nearest first', async () => {
        const { queries } = setup();

        const nearby = await queries.getNearbyStops(32.0561, 34.7795, 3000);
        expect(nearby.map((n) => n.stop.stopCode)).toEqual(['21470', '20002']);
        expect(nearby[0].distance).toBe(0);
        expect(nearby[1].distance).toBeGreaterThan(2000);
        expect(nearby[1].distance).toBeLessThan(3000);
    });

    it('resolves route, agency and destination of known trips', async () => {
        const { queries } = setup();

        const info = await queries.resolveTripsInfo(['ta9001', '30145678_030524', 'missing']);
        expect(Array.from(info.keys())).toEqual(['ta9001', '30145678_030524']);
        expect(info.get('ta9001')).toEqual({
            tripId: 'ta9001',
            routeId: 'ta501',
            directionId: '1',
            routeShortName: '705',
            agencyId: '91',
            destinationCode: '20002',
        });
        expect(info.get('30145678_030524')?.destinationCode).toBe('12345');
    });
});

describe('InMemoryScheduleStore', () => {
    it('returns stop times ordered by sequence', async () => {
        const { store } = setup();
        const stopTimes = await store.getStopTimes('30145678_030524');
        expect(stopTimes.map((st) => st.stopId)).toEqual(['1001', '1002']);
    });

    it('matches translations on any of the source strings', async () => {
        const { store } = setup();
        const rows = await store.getTranslations(['ירושלים', 'רדינג'], 'EN');
        expect(rows.map((r) => r.translation)).toEqual(['Jerusalem', 'Reading']);
    });

    it('lists the stops served by an agency', async () => {
        const { store } = setup();
        const stops = await store.getAgencyStops('91');
        expect(stops.map((s) => s.stopCode)).toEqual(['20001', '20002']);
    });

    it('maps feed stop ids to stop codes, leaving unmapped ids out', async () => {
        const { store } = setup();
        const mapped = await store.getMappedStopCodes(['900', '902', '999']);
        expect(Object.fromEntries(mapped)).toEqual({ '900': '20001', '902': '21470' });
    });
});
