/**
 * ScheduleStore — Read-only access to the static schedule
 * ─────────────────────────────────────────────────────────────────────────
 * Natural-key lookups over agencies, routes, trips, stops, stop times,
 * translations and settlement names. Relations are string joins without
 * referential integrity: every lookup may come back empty and callers must
 * cope with that.
 *
 * InMemoryScheduleStore holds preloaded tables. A database-backed store only
 * has to implement the interface.
 */

import type {
    Agency,
    BoundingBox,
    City,
    FeedStopMapping,
    Route,
    Stop,
    StopTime,
    Translation,
    Trip,
} from '../types';

export interface ScheduleStore {
    getAgency(agencyId: string): Promise<Agency | null>;
    getAgencies(): Promise<Agency[]>;
    getRoute(routeId: string): Promise<Route | null>;
    getRoutesByShortName(agencyId: string, shortName: string): Promise<Route[]>;
    getTrip(tripId: string): Promise<Trip | null>;
    getTrips(tripIds: readonly string[]): Promise<Trip[]>;
    getTripsByRoute(routeId: string, directionId?: number): Promise<Trip[]>;
    /** Ordered by stop sequence */
    getStopTimes(tripId: string): Promise<StopTime[]>;
    getStop(stopId: string): Promise<Stop | null>;
    getStops(stopIds: readonly string[]): Promise<Stop[]>;
    getStopByCode(stopCode: string): Promise<Stop | null>;
    getStopsByName(stopName: string): Promise<Stop[]>;
    getStopsInBox(box: BoundingBox): Promise<Stop[]>;
    /** Distinct stops called at by any trip of the agency's routes */
    getAgencyStops(agencyId: string): Promise<Stop[]>;
    /** Rows whose source string is any of `sources`, optionally for one language */
    getTranslations(sources: readonly string[], lang?: string): Promise<Translation[]>;
    getCity(name: string): Promise<City | null>;
    /** Distinct first segments of routeDesc split on `delimiter`, for one agency */
    countDistinctRouteLicenses(agencyId: string, delimiter: string): Promise<number>;
    /** Delta-feed stop id → canonical stop code, for the ids that have a mapping */
    getMappedStopCodes(feedStopIds: readonly string[]): Promise<Map<string, string>>;
}

export interface ScheduleSnapshot {
    agencies?: Agency[];
    routes?: Route[];
    trips?: Trip[];
    stops?: Stop[];
    stopTimes?: StopTime[];
    translations?: Translation[];
    cities?: City[];
    feedStopMappings?: FeedStopMapping[];
}

const groupBy = <T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> => {
    const groups = new Map<string, T[]>();
    for (const row of rows) {
        const k = key(row);
        const list = groups.get(k);
        if (list) list.push(row);
        else groups.set(k, [row]);
    }
    return groups;
};

export class InMemoryScheduleStore implements ScheduleStore {
    private readonly agencies: Map<string, Agency>;
    private readonly routes: Map<string, Route>;
    private readonly trips: Map<string, Trip>;
    private readonly tripsByRoute: Map<string, Trip[]>;
    private readonly stops: Map<string, Stop>;
    private readonly stopsByCode: Map<string, Stop>;
    private readonly stopTimes: Map<string, StopTime[]>;
    private readonly translations: Map<string, Translation[]>;
    private readonly cities: Map<string, City>;
    private readonly feedStops: Map<string, string>;
    private readonly allStops: Stop[];
    private readonly allRoutes: Route[];

    constructor(snapshot: ScheduleSnapshot = {}) {
        this.agencies = new Map((snapshot.agencies ?? []).map((a) => [a.agencyId, a]));
        this.allRoutes = snapshot.routes ?? [];
        this.routes = new Map(this.allRoutes.map((r) => [r.routeId, r]));
        this.trips = new Map((snapshot.trips ?? []).map((t) => [t.tripId, t]));
        this.tripsByRoute = groupBy(snapshot.trips ?? [], (t) => t.routeId);
        this.allStops = snapshot.stops ?? [];
        this.stops = new Map(this.allStops.map((s) => [s.stopId, s]));
        // first row wins for duplicated codes
        this.stopsByCode = new Map();
        for (const stop of this.allStops) {
            if (!this.stopsByCode.has(stop.stopCode)) this.stopsByCode.set(stop.stopCode, stop);
        }
        this.stopTimes = groupBy(snapshot.stopTimes ?? [], (st) => st.tripId);
        for (const list of this.stopTimes.values()) {
            list.sort((a, b) => a.stopSequence - b.stopSequence);
        }
        this.translations = groupBy(snapshot.translations ?? [], (t) => t.transId);
        this.cities = new Map((snapshot.cities ?? []).map((c) => [c.name, c]));
        this.feedStops = new Map((snapshot.feedStopMappings ?? []).map((m) => [m.feedStopId, m.stopId]));
    }

    async getAgency(agencyId: string) {
        return this.agencies.get(agencyId) ?? null;
    }

    async getAgencies() {
        return Array.from(this.agencies.values());
    }

    async getRoute(routeId: string) {
        return this.routes.get(routeId) ?? null;
    }

    async getRoutesByShortName(agencyId: string, shortName: string) {
        return this.allRoutes.filter((r) => r.agencyId === agencyId && r.routeShortName === shortName);
    }

    async getTrip(tripId: string) {
        return this.trips.get(tripId) ?? null;
    }

    async getTrips(tripIds: readonly string[]) {
        return tripIds.flatMap((id) => {
            const trip = this.trips.get(id);
            return trip ? [trip] : [];
        });
    }

    async getTripsByRoute(routeId: string, directionId?: number) {
        const trips = this.tripsByRoute.get(routeId) ?? [];
        return directionId === undefined ? [...trips] : trips.filter((t) => t.directionId === directionId);
    }

    async getStopTimes(tripId: string) {
        return [...(this.stopTimes.get(tripId) ?? [])];
    }

    async getStop(stopId: string) {
        return this.stops.get(stopId) ?? null;
    }

    async getStops(stopIds: readonly string[]) {
        return stopIds.flatMap((id) => {
            const stop = this.stops.get(id);
            return stop ? [stop] : [];
        });
    }

    async getStopByCode(stopCode: string) {
        return this.stopsByCode.get(stopCode) ?? null;
    }

    async getStopsByName(stopName: string) {
        return this.allStops.filter((s) => s.stopName === stopName);
    }

    async getStopsInBox(box: BoundingBox) {
        return this.allStops.filter((s) =>
            s.stopLat >= box.minLat && s.stopLat <= box.maxLat &&
            s.stopLon >= box.minLon && s.stopLon <= box.maxLon
        );
    }

    async getAgencyStops(agencyId: string) {
        const stopIds = new Set<string>();
        for (const route of this.allRoutes) {
            if (route.agencyId !== agencyId) continue;
            for (const trip of this.tripsByRoute.get(route.routeId) ?? []) {
                for (const st of this.stopTimes.get(trip.tripId) ?? []) stopIds.add(st.stopId);
            }
        }
        return this.getStops(Array.from(stopIds));
    }

    async getTranslations(sources: readonly string[], lang?: string) {
        const rows = Array.from(new Set(sources)).flatMap((source) => this.translations.get(source) ?? []);
        return lang === undefined ? rows : rows.filter((t) => t.lang === lang);
    }

    async getCity(name: string) {
        return this.cities.get(name) ?? null;
    }

    async countDistinctRouteLicenses(agencyId: string, delimiter: string) {
        const licenses = new Set(
            this.allRoutes.filter((r) => r.agencyId === agencyId).map((r) => r.routeDesc.split(delimiter)[0])
        );
        return licenses.size;
    }

    async getMappedStopCodes(feedStopIds: readonly string[]) {
        const mapped = new Map<string, string>();
        for (const feedStopId of feedStopIds) {
            const stopId = this.feedStops.get(feedStopId);
            const stop = stopId === undefined ? undefined : this.stops.get(stopId);
            if (stop) mapped.set(feedStopId, stop.stopCode);
        }
        return mapped;
    }
}
