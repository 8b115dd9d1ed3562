/**
 * GtfsRtCodec — Delta-feed (GTFS-RT) decoding into stop visits
 * ─────────────────────────────────────────────────────────────────────────
 * The feed carries trip updates and vehicle positions for a whole network.
 * Trip ids are feed-local and get a prefix to match the static schedule; stop
 * ids go through a feed-specific mapping table to become stop codes.
 */

import GtfsRealtimeBindings from 'gtfs-realtime-bindings';
import type { transit_realtime } from 'gtfs-realtime-bindings';
import { Producer } from '../types';
import type { Location, TripRouteInfo, Visit } from '../types';
import { DecodeError } from '../utils/errors';
import { AggregatedResponse } from './aggregatedResponse';

type FeedMessage = transit_realtime.FeedMessage;
type StopTimeEvent = transit_realtime.TripUpdate.IStopTimeEvent;

// uint64 fields decode to Long when long.js is around, plain numbers otherwise
type Uint64 = number | { toNumber(): number };

export interface FeedSnapshot {
    message: FeedMessage;
    /** Header timestamp, or the fetch time when the header has none */
    timestamp: Date;
}

export interface FeedReferences {
    tripIds: string[];
    feedStopIds: string[];
}

export interface DeltaFeedContext {
    trips: ReadonlyMap<string, TripRouteInfo>;
    stopMapping: ReadonlyMap<string, string>; // feed stop id → stop code
    tripIdPrefix: string;
}

const toNumber = (value: Uint64 | null | undefined): number =>
    value === null || value === undefined ? 0 : typeof value === 'number' ? value : value.toNumber();

const eventTime = (event: StopTimeEvent | null | undefined): Date | null => {
    const seconds = toNumber(event?.time);
    return seconds > 0 ? new Date(seconds * 1000) : null;
};

export const parseFeedSnapshot = (bytes: Uint8Array, fetchedAt: Date): FeedSnapshot => {
    let message: FeedMessage;
    try {
        message = GtfsRealtimeBindings.transit_realtime.FeedMessage.decode(bytes);
    } catch (e) {
        const raw = Buffer.from(bytes).toString('base64');
        console.error('[DeltaFeed] Failed to decode feed message:', e);
        throw new DecodeError(`Invalid delta feed payload: ${e instanceof Error ? e.message : String(e)}`, raw, { cause: e });
    }
    const seconds = toNumber(message.header?.timestamp);
    return {
        message,
        timestamp: seconds > 0 ? new Date(seconds * 1000) : fetchedAt,
    };
};

/** Prefixed trip ids and raw feed stop ids mentioned by trip updates */
export const collectFeedReferences = (snapshot: FeedSnapshot, tripIdPrefix: string): FeedReferences => {
    const tripIds = new Set<string>();
    const feedStopIds = new Set<string>();
    for (const entity of snapshot.message.entity) {
        const update = entity.tripUpdate;
        if (!update) continue;
        tripIds.add(`${tripIdPrefix}${update.trip.tripId ?? ''}`);
        for (const stu of update.stopTimeUpdate ?? []) {
            if (stu.stopId) feedStopIds.add(stu.stopId);
        }
    }
    return { tripIds: Array.from(tripIds), feedStopIds: Array.from(feedStopIds) };
};

const indexVehiclePositions = (message: FeedMessage): Map<string, Location> => {
    const positions = new Map<string, Location>();
    for (const entity of message.entity) {
        const id = entity.vehicle?.vehicle?.id;
        const position = entity.vehicle?.position;
        if (id && position) {
            positions.set(id, { lat: position.latitude, lon: position.longitude });
        }
    }
    return positions;
};

export const decodeDeltaFeed = (
    snapshot: FeedSnapshot,
    requestedStopCodes: readonly string[],
    { trips, stopMapping, tripIdPrefix }: DeltaFeedContext
): AggregatedResponse => {
    const response = new AggregatedResponse(requestedStopCodes, snapshot.timestamp.toISOString());
    const requested = new Set(requestedStopCodes);
    const positions = indexVehiclePositions(snapshot.message);
    const missingTrips = new Set<string>();

    for (const entity of snapshot.message.entity) {
        const update = entity.tripUpdate;
        if (!update) continue;
        const tripId = `${tripIdPrefix}${update.trip.tripId ?? ''}`;
        const vehicleRef = update.vehicle?.id || null;

        for (const stu of update.stopTimeUpdate ?? []) {
            const stopCode = stu.stopId ? stopMapping.get(stu.stopId) : undefined;
            if (stopCode === undefined || !requested.has(stopCode)) continue;

            const info = trips.get(tripId);
            if (!info) {
                missingTrips.add(tripId);
                continue;
            }
            const eta = eventTime(stu.arrival) ?? eventTime(stu.departure);
            if (!eta) continue;

            const visit: Visit = {
                producer: Producer.GTFS_RT,
                stopCode,
                routeId: info.routeId,
                lineId: info.routeId,
                directionId: info.directionId,
                lineName: info.routeShortName,
                operatorId: info.agencyId,
                destinationId: info.destinationCode,
                vehicleRef,
                tripId,
                eta,
                departed: null,
                status: null,
                location: vehicleRef ? positions.get(vehicleRef) ?? null : null,
                timestamp: snapshot.timestamp,
                source: stu,
            };
            response.addVisit(visit);
        }
    }

    for (const tripId of missingTrips) {
        console.warn(`[DeltaFeed] Missing schedule info for trip ${tripId}, dropping its visits`);
    }
    return response;
};
