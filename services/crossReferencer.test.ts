import { describe, expect, it } from 'vitest';
import { makeVisit, scheduleStore } from '../fixtures/visits';
import { createCrossReferencer } from './crossReferencer';
import { createTranslator } from './translations';

const setup = () => {
    const store = scheduleStore();
    return createCrossReferencer({ store, translator: createTranslator({ store }) });
};

describe('createCrossReferencer', () => {
    it('resolves the destination and headsign through the trip', async () => {
        const info = await setup().resolve(makeVisit());

        expect(info).toEqual({
            destination: {
                code: '12345',
                name: { EN: 'Jerusalem Central Station', HE: 'ת. מרכזית ירושלים' },
                address: { street: 'שדרות שז"ר 6', city: 'Jerusalem', platform: '', floor: '3' },
                location: { lat: 31.789, lon: 35.203 },
            },
            agency: { name: { HE: 'אגד', EN: 'Egged' }, url: 'http://www.egged.co.il' },
            headsign: { EN: 'Jerusalem', HE: 'ירושלים' },
        });
    });

    it('takes the stop with the highest sequence as the destination', async () => {
        const info = await setup().resolve(makeVisit({ tripId: '40000001_030524' }));
        expect(info.destination?.code).toBe('21470');
        expect(info.headsign).toBeNull();
    });

    it('falls back to the destination stop code without a known trip', async () => {
        const info = await setup().resolve(makeVisit({ tripId: '1_010101', destinationId: '20001' }));

        expect(info.destination).toEqual({
            code: '20001',
            name: { EN: 'Reading' },
            address: { street: 'איינשטיין', city: 'Tel Aviv-Yafo', platform: '', floor: '' },
            location: { lat: 32.101, lon: 34.79 },
        });
        expect(info.headsign).toBeNull();
    });

    it('falls back to the destination stop code when the trip has no stop times', async () => {
        const info = await setup().resolve(makeVisit({ tripId: 'T_030524', destinationId: '20001' }));

        expect(info.destination?.code).toBe('20001');
        expect(info.destination?.name).toEqual({ EN: 'Reading' });
        expect(info.headsign).toEqual({ EN: 'Jerusalem', HE: 'ירושלים' });
    });

    it('leaves the destination out when a trip without stop times has no destination code', async () => {
        const info = await setup().resolve(makeVisit({ tripId: 'T_030524', destinationId: null }));
        expect(info.destination).toBeNull();
        expect(info.headsign).toEqual({ EN: 'Jerusalem', HE: 'ירושלים' });
    });

    it('leaves the destination out when neither trip nor stop is known', async () => {
        const info = await setup().resolve(makeVisit({ tripId: null, destinationId: '77777' }));
        expect(info.destination).toBeNull();
        expect(info.headsign).toBeNull();
        expect(info.agency.url).toBe('http://www.egged.co.il');
    });

    it('leaves the agency empty for an unknown operator', async () => {
        const info = await setup().resolve(makeVisit({ operatorId: '999' }));
        expect(info.agency).toEqual({ name: null, url: null });
    });

    it('uses the agency name in English when there is no display name', async () => {
        const info = await setup().resolve(makeVisit({ operatorId: '91', tripId: 'ta9001' }));
        expect(info.agency).toEqual({ name: { HE: 'נעים בסופ"ש', EN: 'נעים בסופ"ש' }, url: null });
        expect(info.destination?.code).toBe('20002');
        expect(info.destination?.address).toEqual({});
    });

    it('resolves every visit into a map keyed by the visit', async () => {
        const a = makeVisit();
        const b = makeVisit({ tripId: null, destinationId: null });
        const resolved = await setup().resolveAll([a, b]);

        expect(resolved.size).toBe(2);
        expect(resolved.get(a)?.destination?.code).toBe('12345');
        expect(resolved.get(b)?.destination).toBeNull();
    });
});
