import GtfsRealtimeBindings from 'gtfs-realtime-bindings';

const { FeedMessage } = GtfsRealtimeBindings.transit_realtime;

export const FEED_TIME = 1714763400; // 2024-05-03T19:10:00Z
export const ARRIVAL_AT_900 = 1714763700; // 19:15Z
export const DEPARTURE_AT_901 = 1714764000; // 19:20Z

/** Trip 9001 runs 900 → 901 → 999 (unmapped); trip 9999 is unknown to the schedule */
export const deltaFeedBytes = (timestamp: number = FEED_TIME): Uint8Array =>
    FeedMessage.encode(FeedMessage.fromObject({
        header: { gtfsRealtimeVersion: '2.0', timestamp },
        entity: [
            { id: 'v1', vehicle: { vehicle: { id: 'bus-7' }, position: { latitude: 32.125, longitude: 34.75 } } },
            {
                id: 't1',
                tripUpdate: {
                    trip: { tripId: '9001' },
                    vehicle: { id: 'bus-7' },
                    stopTimeUpdate: [
                        { stopSequence: 1, stopId: '900', arrival: { time: ARRIVAL_AT_900 } },
                        { stopSequence: 2, stopId: '901', departure: { time: DEPARTURE_AT_901 } },
                        { stopSequence: 3, stopId: '999', arrival: { time: DEPARTURE_AT_901 + 600 } },
                    ],
                },
            },
            {
                id: 't2',
                tripUpdate: {
                    trip: { tripId: '9999' },
                    stopTimeUpdate: [{ stopSequence: 1, stopId: '900', arrival: { time: ARRIVAL_AT_900 + 60 } }],
                },
            },
            {
                id: 't3',
                tripUpdate: {
                    trip: { tripId: '9001' },
                    stopTimeUpdate: [{ stopSequence: 2, stopId: '901' }],
                },
            },
        ],
    })).finish();
