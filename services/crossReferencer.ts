/**
 * CrossReferencer — Static schedule enrichment for live visits
 * ─────────────────────────────────────────────────────────────────────────
 * Destination resolution, first match wins:
 *   1. visit.tripId → trip → last stop by sequence (headsign from the trip)
 *   2. visit.destinationId → stop by code, also when step 1 found the trip
 *      but not its last stop (the trip's headsign is kept)
 *   3. nothing: the live feed knows a trip or stop the schedule doesn't
 *
 * Direction is not disambiguated: a route id shared by both directions
 * resolves through whichever trip the live source names.
 */

import { DEFAULT_LANGUAGE } from '../constants';
import operatorNamesData from '../data/operators.json';
import type { Agency, StaticDestination, StaticInfo, Stop, TranslatedName, Visit } from '../types';
import type { ScheduleStore } from './scheduleStore';
import type { Translator } from './translations';

export interface CrossReferencerOptions {
    store: ScheduleStore;
    translator: Translator;
    /** Operator id → English display name, missing from the translation table */
    operatorNames?: Readonly<Record<string, string>>;
    defaultLanguage?: string;
}

export interface CrossReferencer {
    resolve(visit: Visit): Promise<StaticInfo>;
    resolveAll(visits: readonly Visit[]): Promise<Map<Visit, StaticInfo>>;
}

export const OPERATOR_NAMES: Readonly<Record<string, string>> = operatorNamesData;

export function createCrossReferencer({
    store,
    translator,
    operatorNames = OPERATOR_NAMES,
    defaultLanguage = DEFAULT_LANGUAGE,
}: CrossReferencerOptions): CrossReferencer {
    const describeStop = async (stop: Stop): Promise<StaticDestination> => {
        const [name, address] = await Promise.all([
            translator.getTranslation(stop.stopName),
            translator.getTranslatedAddress(stop),
        ]);
        return {
            code: stop.stopCode,
            name,
            address,
            location: { lat: stop.stopLat, lon: stop.stopLon },
        };
    };

    const lastStopOfTrip = async (tripId: string): Promise<Stop | null> => {
        const stopTimes = await store.getStopTimes(tripId);
        let last = stopTimes[0];
        for (const st of stopTimes) {
            if (st.stopSequence > last.stopSequence) last = st;
        }
        return last ? store.getStop(last.stopId) : null;
    };

    const agencyName = (agency: Agency, operatorId: string): TranslatedName => ({
        [defaultLanguage]: agency.agencyName,
        EN: operatorNames[operatorId] ?? agency.agencyName,
    });

    const resolve = async (visit: Visit): Promise<StaticInfo> => {
        const [trip, agency] = await Promise.all([
            visit.tripId ? store.getTrip(visit.tripId) : Promise.resolve(null),
            visit.operatorId ? store.getAgency(visit.operatorId) : Promise.resolve(null),
        ]);

        let destinationStop: Stop | null = null;
        let headsign: TranslatedName | null = null;
        if (trip) {
            destinationStop = await lastStopOfTrip(trip.tripId);
            if (trip.tripHeadsign !== '') headsign = await translator.getTranslation(trip.tripHeadsign);
        }
        if (!destinationStop && visit.destinationId) {
            destinationStop = await store.getStopByCode(visit.destinationId);
        }

        return {
            destination: destinationStop ? await describeStop(destinationStop) : null,
            agency: {
                name: agency && visit.operatorId ? agencyName(agency, visit.operatorId) : null,
                url: agency?.agencyUrl ?? null,
            },
            headsign,
        };
    };

    const resolveAll = async (visits: readonly Visit[]): Promise<Map<Visit, StaticInfo>> => {
        const resolved = await Promise.all(visits.map(async (visit) => [visit, await resolve(visit)] as const));
        return new Map(resolved);
    };

    return { resolve, resolveAll };
}
