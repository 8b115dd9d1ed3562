export enum Producer {
  SIRI = 'SIRI',
  GTFS_RT = 'GTFS-RT'
}

export interface Location {
  lat: number;
  lon: number;
}

/** Translations of one source string, keyed by upper-case language code (HE, EN, AR...) */
export type TranslatedName = Record<string, string>;

/**
 * One normalized real-time prediction of a vehicle arriving at a stop.
 * Visits are never mutated after decoding; enrichment lives in StaticInfo.
 */
export interface Visit {
  readonly producer: Producer;
  readonly stopCode: string;
  readonly routeId: string;
  readonly lineId: string; // SIRI LineRef, identical to routeId
  readonly directionId: string | null;
  readonly lineName: string | null;
  readonly operatorId: string | null;
  readonly destinationId: string | null;
  readonly vehicleRef: string | null;
  readonly tripId: string | null; // "{trip-number}_{ddMMyy}" for SIRI
  readonly eta: Date;
  readonly departed: Date | null; // aimed departure from the origin
  readonly status: string | null; // OnTime, early, delayed, cancelled, arrived, noReport
  readonly location: Location | null;
  readonly timestamp: Date; // when the prediction was recorded at the source
  readonly source?: unknown; // raw record, transient
}

export interface StopAddress {
  street?: string;
  city?: string;
  platform?: string;
  floor?: string;
}

export interface StaticDestination {
  code: string;
  name: TranslatedName | null;
  address: StopAddress | null;
  location: Location;
}

export interface StaticInfo {
  destination: StaticDestination | null;
  agency: {
    name: TranslatedName | null;
    url: string | null;
  };
  headsign: TranslatedName | null;
}

// --- Static schedule rows ---

export interface Agency {
  agencyId: string;
  agencyName: string;
  agencyUrl: string | null;
  agencyTimezone?: string;
  agencyLang?: string;
}

export interface Route {
  routeId: string;
  agencyId: string;
  routeShortName: string;
  routeLongName: string;
  routeDesc: string; // license number, "{license}-{direction}-{alternative}"
  routeType: number;
  routeColor?: string;
}

export interface Trip {
  tripId: string;
  routeId: string;
  serviceId: string;
  tripHeadsign: string;
  directionId: number;
  shapeId?: string;
}

export interface Stop {
  stopId: string;
  stopCode: string;
  stopName: string;
  stopDesc: string;
  stopLat: number;
  stopLon: number;
  locationType?: number;
  parentStation?: string;
  zoneId?: string;
}

export interface StopTime {
  tripId: string;
  arrivalTime: string;
  departureTime: string;
  stopId: string;
  stopSequence: number;
}

export interface Translation {
  transId: string; // the source string
  lang: string;
  translation: string;
}

/** Settlement name to its official transliteration, outside of GTFS */
export interface City {
  name: string;
  englishName: string;
}

/** Delta-feed stop id to canonical schedule stop id */
export interface FeedStopMapping {
  feedStopId: string;
  stopId: string;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Static facts about a trip the delta feed does not carry itself */
export interface TripRouteInfo {
  tripId: string;
  routeId: string;
  directionId: string;
  routeShortName: string;
  agencyId: string;
  destinationCode: string | null;
}
