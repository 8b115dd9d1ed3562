/**
 * FeedStopMatcher — Builds the delta feed's stop mapping table
 * ─────────────────────────────────────────────────────────────────────────
 * The delta feed publishes its own stop ids. Each feed stop is matched to a
 * schedule stop by, in order:
 *   code → exact lat/lon → the only stop within 9 m → exact name → cleaned name
 * Name matches are the least reliable since names are not unique.
 */

import type { FeedStopMapping, Stop } from '../types';
import { boundingBox, haversineMeters } from '../utils/geo';
import type { ScheduleStore } from './scheduleStore';

export interface FeedStopRow {
    stopId: string;
    stopCode: string;
    stopName: string;
    stopLat: string;
    stopLon: string;
}

export type MatchStrategy = 'code' | 'location' | 'nearby' | 'name' | 'cleanedName';

export interface FeedStopMatchResult {
    mappings: FeedStopMapping[];
    counts: Record<MatchStrategy, number>;
    failed: FeedStopRow[];
}

export const FUZZY_MATCH_RADIUS_M = 9;

/** Trims around slashes and swaps backticks for apostrophes */
export const cleanStopName = (name: string): string =>
    name.split('/').map((part) => part.trim()).join('/').replaceAll('`', "'");

type MatcherStore = Pick<ScheduleStore, 'getStopByCode' | 'getStopsInBox' | 'getStopsByName'>;

const findByLocation = async (store: MatcherStore, lat: number, lon: number): Promise<Stop | null> => {
    const [stop] = await store.getStopsInBox({ minLat: lat, maxLat: lat, minLon: lon, maxLon: lon });
    return stop ?? null;
};

const findNearby = async (store: MatcherStore, lat: number, lon: number): Promise<Stop[]> => {
    const center = { lat, lon };
    const candidates = await store.getStopsInBox(boundingBox(center, FUZZY_MATCH_RADIUS_M));
    return candidates.filter((s) => haversineMeters(center, { lat: s.stopLat, lon: s.stopLon }) <= FUZZY_MATCH_RADIUS_M);
};

const matchOne = async (store: MatcherStore, row: FeedStopRow): Promise<[MatchStrategy, Stop] | null> => {
    const code = row.stopCode.trim();
    if (code !== '') {
        const stop = await store.getStopByCode(code);
        if (stop) return ['code', stop];
    }

    if (row.stopLat.trim() !== '' && row.stopLon.trim() !== '') {
        const lat = Number(row.stopLat);
        const lon = Number(row.stopLon);
        if (Number.isFinite(lat) && Number.isFinite(lon)) {
            const exact = await findByLocation(store, lat, lon);
            if (exact) return ['location', exact];

            const nearby = await findNearby(store, lat, lon);
            if (nearby.length === 1) return ['nearby', nearby[0]];
            if (nearby.length > 1) {
                console.warn(`[FeedStops] ${nearby.length} stops around feed stop ${row.stopId}, skipping location match`);
            }
        }
    }

    if (row.stopName !== '') {
        const [byName] = await store.getStopsByName(row.stopName);
        if (byName) return ['name', byName];
        const [byCleanedName] = await store.getStopsByName(cleanStopName(row.stopName));
        if (byCleanedName) return ['cleanedName', byCleanedName];
    }
    return null;
};

export const matchFeedStops = async (feedStops: readonly FeedStopRow[], store: MatcherStore): Promise<FeedStopMatchResult> => {
    const result: FeedStopMatchResult = {
        mappings: [],
        counts: { code: 0, location: 0, nearby: 0, name: 0, cleanedName: 0 },
        failed: [],
    };

    for (const row of feedStops) {
        const match = await matchOne(store, row);
        if (!match) {
            result.failed.push(row);
            continue;
        }
        const [strategy, stop] = match;
        result.mappings.push({ feedStopId: row.stopId, stopId: stop.stopId });
        result.counts[strategy] += 1;
    }

    console.log(
        `[FeedStops] Matched ${result.mappings.length} stops ` +
        `(code ${result.counts.code}, location ${result.counts.location}, nearby ${result.counts.nearby}, ` +
        `name ${result.counts.name}, cleaned name ${result.counts.cleanedName}), failed ${result.failed.length}`
    );
    return result;
};
