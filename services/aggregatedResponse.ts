import type { StaticInfo, Visit } from '../types';

// ── Serialized shapes (front-end contract) ────────────────────────────────────

export interface VisitDict {
    producer: string;
    stop_code: string;
    route_id: string;
    line_id: string;
    direction_id: string | null;
    line_name: string | null;
    operator_id: string | null;
    destination_id: string | null;
    vehicle_ref: string | null;
    trip_id: string | null;
    eta: string;
    departed: string | null;
    status: string | null;
    location: { lat: number; lon: number } | null;
    timestamp: string;
    static_info: { route: StaticInfo } | null;
}

export interface AggregatedResponseDict {
    errors: string[] | null;
    timestamp: string;
    visits: Record<string, VisitDict[]>;
}

// ── Equality ──────────────────────────────────────────────────────────────────

/**
 * Two visits describe the same real-world prediction. `producer` is part of the
 * key because the two sources have independent id spaces.
 */
export const visitsEqual = (a: Visit, b: Visit): boolean =>
    a.producer === b.producer &&
    a.stopCode === b.stopCode &&
    a.eta.getTime() === b.eta.getTime() &&
    a.routeId === b.routeId &&
    a.vehicleRef === b.vehicleRef &&
    a.directionId === b.directionId &&
    a.timestamp.getTime() === b.timestamp.getTime();

export const visitToDict = (visit: Visit, staticInfo?: StaticInfo): VisitDict => ({
    producer: visit.producer,
    stop_code: visit.stopCode,
    route_id: visit.routeId,
    line_id: visit.lineId,
    direction_id: visit.directionId,
    line_name: visit.lineName,
    operator_id: visit.operatorId,
    destination_id: visit.destinationId,
    vehicle_ref: visit.vehicleRef,
    trip_id: visit.tripId,
    eta: visit.eta.toISOString(),
    departed: visit.departed ? visit.departed.toISOString() : null,
    status: visit.status,
    location: visit.location ? { lat: visit.location.lat, lon: visit.location.lon } : null,
    timestamp: visit.timestamp.toISOString(),
    static_info: staticInfo ? { route: staticInfo } : null,
});

// ── Response ──────────────────────────────────────────────────────────────────

/**
 * Visits per requested stop code. Every requested code has a key, possibly with
 * an empty list; a missing key never means "no data". Lists are replaced rather
 * than mutated since they may be shared with the realtime cache.
 */
export class AggregatedResponse {
    readonly visits = new Map<string, readonly Visit[]>();
    readonly errors: string[] = [];
    timestamp: string | null;

    constructor(stopCodes: Iterable<string>, timestamp: string | null = null) {
        for (const code of stopCodes) {
            this.visits.set(code, []);
        }
        this.timestamp = timestamp;
    }

    get stopCodes(): string[] {
        return Array.from(this.visits.keys());
    }

    visitsFor(stopCode: string): readonly Visit[] {
        return this.visits.get(stopCode) ?? [];
    }

    allVisits(): Visit[] {
        return Array.from(this.visits.values()).flat();
    }

    /** Adds a decoded visit under its stop code. Returns false when the stop was not requested. */
    addVisit(visit: Visit): boolean {
        const current = this.visits.get(visit.stopCode);
        if (!current) return false;
        this.visits.set(visit.stopCode, [...current, visit]);
        return true;
    }

    setVisits(stopCode: string, visits: readonly Visit[]): void {
        this.visits.set(stopCode, visits);
    }

    append(other: AggregatedResponse): this {
        mergeResponses(this, other);
        return this;
    }

    filterVisits(predicate: (visit: Visit) => boolean): AggregatedResponse {
        const filtered = new AggregatedResponse([], this.timestamp);
        filtered.errors.push(...this.errors);
        for (const [code, visits] of this.visits) {
            filtered.visits.set(code, visits.filter(predicate));
        }
        return filtered;
    }

    toDict(staticInfo?: ReadonlyMap<Visit, StaticInfo>): AggregatedResponseDict {
        const visits: Record<string, VisitDict[]> = {};
        for (const [code, list] of this.visits) {
            visits[code] = list.map((visit) => visitToDict(visit, staticInfo?.get(visit)));
        }
        return {
            errors: this.errors.length > 0 ? [...this.errors] : null,
            timestamp: this.timestamp ?? '',
            visits,
        };
    }
}

/**
 * Merges `b` into `a` in place. Errors concatenate. Shared stop codes keep `a`'s
 * visits and append those of `b` not already present; codes only in `b` are
 * adopted as they are.
 */
export function mergeResponses(a: AggregatedResponse, b: AggregatedResponse): AggregatedResponse {
    a.errors.push(...b.errors);

    for (const [code, incoming] of b.visits) {
        const existing = a.visits.get(code);
        if (!existing) {
            a.visits.set(code, [...incoming]);
            continue;
        }
        const merged = [...existing];
        for (const visit of incoming) {
            if (!merged.some((known) => visitsEqual(known, visit))) {
                merged.push(visit);
            }
        }
        a.visits.set(code, merged);
    }

    if (a.timestamp === null) a.timestamp = b.timestamp;
    return a;
}
