import { describe, expect, it } from 'vitest';
import { makeVisit } from '../fixtures/visits';
import { Producer } from '../types';
import { AggregatedResponse, mergeResponses, visitsEqual } from './aggregatedResponse';

describe('visitsEqual', () => {
    it('ignores the raw source record', () => {
        const a = makeVisit({ source: { raw: 1 } });
        const b = makeVisit({ source: { raw: 2 } });
        expect(visitsEqual(a, b)).toBe(true);
        expect(visitsEqual(b, a)).toBe(true);
    });

    it('tells producers apart', () => {
        expect(visitsEqual(makeVisit(), makeVisit({ producer: Producer.GTFS_RT }))).toBe(false);
    });

    it('compares dates by instant', () => {
        const a = makeVisit({ eta: new Date('2024-05-03T10:22:00+03:00') });
        const b = makeVisit({ eta: new Date('2024-05-03T07:22:00Z') });
        expect(visitsEqual(a, b)).toBe(true);
    });
});

describe('AggregatedResponse', () => {
    it('has exactly the requested keys', () => {
        const response = new AggregatedResponse(['1', '2']);
        expect(response.stopCodes).toEqual(['1', '2']);
        expect(response.visitsFor('1')).toEqual([]);
    });

    it('refuses visits for stops that were not requested', () => {
        const response = new AggregatedResponse(['1']);
        expect(response.addVisit(makeVisit({ stopCode: '2' }))).toBe(false);
        expect(response.stopCodes).toEqual(['1']);
    });

    it('filters into a new response with the same keys', () => {
        const response = new AggregatedResponse(['21470', '12345'], '2024-05-03T10:15:02+03:00');
        response.addVisit(makeVisit({ lineName: '480' }));
        response.addVisit(makeVisit({ lineName: '18', routeId: '7023' }));
        response.errors.push('partial');

        const filtered = response.filterVisits((v) => v.lineName === '18');
        expect(filtered.stopCodes).toEqual(['21470', '12345']);
        expect(filtered.visitsFor('21470').map((v) => v.routeId)).toEqual(['7023']);
        expect(filtered.errors).toEqual(['partial']);
        expect(response.visitsFor('21470')).toHaveLength(2);
    });

    it('serializes visits with their static info', () => {
        const visit = makeVisit({ location: { lat: 32.08, lon: 34.78 } });
        const response = new AggregatedResponse(['21470', '12345'], '2024-05-03T10:15:02+03:00');
        response.addVisit(visit);
        const info = { destination: null, agency: { name: null, url: null }, headsign: null };

        const dict = response.toDict(new Map([[visit, info]]));
        expect(dict.errors).toBeNull();
        expect(dict.timestamp).toBe('2024-05-03T10:15:02+03:00');
        expect(dict.visits['12345']).toEqual([]);
        expect(dict.visits['21470']).toEqual([{
            producer: 'SIRI',
            stop_code: '21470',
            route_id: '10938',
            line_id: '10938',
            direction_id: '2',
            line_name: '480',
            operator_id: '3',
            destination_id: '12345',
            vehicle_ref: '7419982',
            trip_id: '30145678_030524',
            eta: '2024-05-03T07:22:00.000Z',
            departed: null,
            status: null,
            location: { lat: 32.08, lon: 34.78 },
            timestamp: '2024-05-03T07:14:40.000Z',
            static_info: { route: info },
        }]);
    });

    it('serializes errors when there are some', () => {
        const response = new AggregatedResponse(['1']);
        response.errors.push('X');
        expect(response.toDict()).toEqual({ errors: ['X'], timestamp: '', visits: { '1': [] } });
    });
});

describe('mergeResponses', () => {
    it('concatenates errors and appends only unseen visits', () => {
        const shared = makeVisit();
        const later = makeVisit({ eta: new Date('2024-05-03T07:40:00Z') });
        const a = new AggregatedResponse(['21470']);
        a.addVisit(shared);
        a.errors.push('a failed');
        const b = new AggregatedResponse(['21470'], '2024-05-03T10:15:02+03:00');
        b.addVisit(makeVisit({ source: 'other copy' }));
        b.addVisit(later);
        b.errors.push('b failed');

        mergeResponses(a, b);
        expect(a.visitsFor('21470')).toEqual([shared, later]);
        expect(a.errors).toEqual(['a failed', 'b failed']);
        expect(a.timestamp).toBe('2024-05-03T10:15:02+03:00');
    });

    it('adopts stops only the second response has', () => {
        const a = new AggregatedResponse(['1']);
        const b = new AggregatedResponse(['2']);
        const visit = makeVisit({ stopCode: '2' });
        b.addVisit(visit);

        mergeResponses(a, b);
        expect(a.stopCodes).toEqual(['1', '2']);
        expect(a.visitsFor('2')).toEqual([visit]);
    });

    it('is idempotent against a copy of itself', () => {
        const a = new AggregatedResponse(['21470']);
        a.addVisit(makeVisit());
        a.addVisit(makeVisit({ routeId: '7023' }));
        const copy = a.filterVisits(() => true);

        a.append(copy);
        expect(a.visitsFor('21470')).toHaveLength(2);
    });

    it('does not mutate the lists it merged from', () => {
        const list = [makeVisit()];
        const a = new AggregatedResponse(['21470']);
        a.setVisits('21470', list);
        const b = new AggregatedResponse(['21470']);
        b.addVisit(makeVisit({ routeId: '7023' }));

        mergeResponses(a, b);
        expect(list).toHaveLength(1);
        expect(a.visitsFor('21470')).toHaveLength(2);
    });

    it('keeps producers apart when ids collide', () => {
        const a = new AggregatedResponse(['21470']);
        a.addVisit(makeVisit());
        const b = new AggregatedResponse(['21470']);
        b.addVisit(makeVisit({ producer: Producer.GTFS_RT }));

        mergeResponses(a, b);
        expect(a.visitsFor('21470').map((v) => v.producer)).toEqual([Producer.SIRI, Producer.GTFS_RT]);
    });
});
