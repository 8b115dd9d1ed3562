/**
 * ScheduleQueries — Cached read models over the static schedule
 * ─────────────────────────────────────────────────────────────────────────
 * Stop info, routes by operator and name, the ordered stops of a route,
 * rail stations, nearby stops and the trip facts the delta feed needs. Results are cached
 * for the static TTL; the schedule only changes on a reload.
 */

import { RAIL_AGENCY_ID, STATIC_CACHE_TTL, STOP_INFO_CACHE_TTL } from '../constants';
import type { Location, Route, Stop, StopAddress, TranslatedName, TripRouteInfo } from '../types';
import { boundingBox, haversineMeters } from '../utils/geo';
import type { ScheduleStore } from './scheduleStore';
import type { Translator } from './translations';
import { TtlCache } from './ttlCache';
import type { Clock } from './ttlCache';

export interface StopInfo {
    name: TranslatedName;
    address: StopAddress;
    location: Location;
}

export interface RouteStop {
    stop: Stop;
    sequence: number;
    name: TranslatedName;
    address: StopAddress;
}

export interface Station {
    code: string;
    name: TranslatedName;
}

export interface NearbyStop {
    stop: Stop;
    distance: number; // meters
}

export interface ScheduleQueriesOptions {
    store: ScheduleStore;
    translator: Translator;
    ttl?: number; // seconds
    stopInfoTtl?: number; // seconds
    clock?: Clock;
}

// The route license field reads "{license}-{direction}-{alternative}"
const LICENSE_DELIMITER = '-';

export function createScheduleQueries({
    store,
    translator,
    ttl = STATIC_CACHE_TTL,
    stopInfoTtl = STOP_INFO_CACHE_TTL,
    clock,
}: ScheduleQueriesOptions) {
    const stopInfoCache = new TtlCache<StopInfo | null>(clock);
    const routesCache = new TtlCache<Route[]>(clock);
    const routeStopsCache = new TtlCache<RouteStop[] | null>(clock);
    const countCache = new TtlCache<number>(clock);
    const stationsCache = new TtlCache<Station[]>(clock);

    const getStopInfo = (stopCode: string): Promise<StopInfo | null> =>
        stopInfoCache.getOrLoad(stopCode, stopInfoTtl, async () => {
            const stop = await store.getStopByCode(stopCode);
            if (!stop) return null;
            const [name, address] = await Promise.all([
                translator.getTranslation(stop.stopName),
                translator.getTranslatedAddress(stop),
            ]);
            return { name, address, location: { lat: stop.stopLat, lon: stop.stopLon } };
        });

    /** Sorted by route id so duplicates of a name come back in a stable order */
    const getRoutes = (operatorId: string, shortName: string): Promise<Route[]> =>
        routesCache.getOrLoad(`${operatorId}:${shortName}`, ttl, async () => {
            const routes = await store.getRoutesByShortName(operatorId, shortName);
            return [...routes].sort((a, b) => a.routeId.localeCompare(b.routeId));
        });

    /** Stops of one representative trip, in travel order; null for an unknown route */
    const getRouteStops = (routeId: string, directionId?: number): Promise<RouteStop[] | null> =>
        routeStopsCache.getOrLoad(`${routeId}:${directionId ?? '*'}`, stopInfoTtl, async () => {
            const [trip] = await store.getTripsByRoute(routeId, directionId);
            if (!trip) return null;
            const stopTimes = await store.getStopTimes(trip.tripId);
            const sequence = new Map(stopTimes.map((st) => [st.stopId, st.stopSequence]));
            const stops = await store.getStops(Array.from(sequence.keys()));

            const routeStops = await Promise.all(stops.map(async (stop): Promise<RouteStop> => ({
                stop,
                sequence: sequence.get(stop.stopId) ?? 0,
                name: await translator.getTranslation(stop.stopName),
                address: await translator.getTranslatedAddress(stop),
            })));
            return routeStops.sort((a, b) => a.sequence - b.sequence);
        });

    const countRoutes = (operatorId: string): Promise<number> =>
        countCache.getOrLoad(operatorId, ttl, () => store.countDistinctRouteLicenses(operatorId, LICENSE_DELIMITER));

    /** Every station of the rail operator; station names double as settlement names */
    const getRailStations = (agencyId: string = RAIL_AGENCY_ID): Promise<Station[]> =>
        stationsCache.getOrLoad(agencyId, ttl, async () => {
            const stops = await store.getAgencyStops(agencyId);
            return Promise.all(stops.map(async (stop): Promise<Station> => {
                const name = { ...(await translator.getTranslation(stop.stopName)) };
                if (!('EN' in name)) {
                    const city = await store.getCity(stop.stopName);
                    if (city) name.EN = city.englishName;
                }
                return { code: stop.stopCode, name };
            }));
        });

    const getNearbyStops = async (lat: number, lon: number, radiusM: number): Promise<NearbyStop[]> => {
        const center = { lat, lon };
        const candidates = await store.getStopsInBox(boundingBox(center, radiusM));
        return candidates
            .map((stop) => ({ stop, distance: haversineMeters(center, { lat: stop.stopLat, lon: stop.stopLon }) }))
            .filter((s) => s.distance <= radiusM)
            .sort((a, b) => a.distance - b.distance);
    };

    /** Route, agency and destination of each trip the store knows; unknown ids are left out */
    const resolveTripsInfo = async (tripIds: readonly string[]): Promise<Map<string, TripRouteInfo>> => {
        const trips = await store.getTrips(tripIds);
        const resolved = await Promise.all(trips.map(async (trip): Promise<TripRouteInfo | null> => {
            const [route, stopTimes] = await Promise.all([store.getRoute(trip.routeId), store.getStopTimes(trip.tripId)]);
            if (!route) return null;
            const last = stopTimes.at(-1);
            const destination = last ? await store.getStop(last.stopId) : null;
            return {
                tripId: trip.tripId,
                routeId: route.routeId,
                directionId: String(trip.directionId),
                routeShortName: route.routeShortName,
                agencyId: route.agencyId,
                destinationCode: destination?.stopCode ?? null,
            };
        }));
        const info = new Map<string, TripRouteInfo>();
        for (const row of resolved) {
            if (row) info.set(row.tripId, row);
        }
        return info;
    };

    return { getStopInfo, getRoutes, getRouteStops, countRoutes, getRailStations, getNearbyStops, resolveTripsInfo };
}

export type ScheduleQueries = ReturnType<typeof createScheduleQueries>;
