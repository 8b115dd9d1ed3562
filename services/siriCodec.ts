/**
 * SiriCodec — Stop-monitoring (SIRI-SM) request encoding and response decoding
 * ─────────────────────────────────────────────────────────────────────────────
 * Two wire variants are in the field:
 *  1. SOAP/XML: one envelope per group of stops, answered by an envelope whose
 *     SIRI elements carry a namespace prefix that changes between protocol
 *     minor versions. The prefix is read from the response's own xmlns map.
 *  2. JSON: a GET with a comma-joined MonitoringRef, answered by a
 *     `Siri.ServiceDelivery` document without prefixes.
 *
 * Both decode into one AggregatedResponse of normalized Visits.
 */

import { format, formatISO, isValid, parseISO } from 'date-fns';
import { parseStringPromise } from 'xml2js';
import { DEFAULT_SIRI_PREFIX, SIRI_NAMESPACE_URI } from '../constants';
import { Producer } from '../types';
import type { Location, Visit } from '../types';
import { DecodeError } from '../utils/errors';
import { oneOrMany } from '../utils/oneOrMany';
import { AggregatedResponse } from './aggregatedResponse';

// ── Encoding ──────────────────────────────────────────────────────────────────

export interface SiriRequestOptions {
    requestorRef: string;
    now?: Date;
}

const PREVIEW_INTERVAL = 'PT30M';

const escapeXml = (value: string): string =>
    value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');

/**
 * Builds one SOAP payload for a whole group of stops. Each stop gets its own
 * StopMonitoringRequest with an increasing message id.
 */
export function encodeStopMonitoringRequest(
    stopCodes: readonly string[],
    maxVisits: number,
    { requestorRef, now = new Date() }: SiriRequestOptions
): string {
    const timestamp = formatISO(now);
    const numericTimestamp = now.getTime() / 1000;
    const requestor = escapeXml(requestorRef);

    const body = stopCodes.map((stopCode, i) =>
        '<siri:StopMonitoringRequest version="IL2.71" xsi:type="siri:StopMonitoringRequestStructure">' +
        `<siri:RequestTimestamp>${timestamp}</siri:RequestTimestamp>` +
        `<siri:MessageIdentifier xsi:type="siri:MessageQualifierStructure">${i}</siri:MessageIdentifier>` +
        `<siri:PreviewInterval>${PREVIEW_INTERVAL}</siri:PreviewInterval>` +
        `<siri:MonitoringRef xsi:type="siri:MonitoringRefStructure">${escapeXml(stopCode)}</siri:MonitoringRef>` +
        `<siri:MaximumStopVisits>${maxVisits}</siri:MaximumStopVisits>` +
        '</siri:StopMonitoringRequest>'
    ).join('');

    return '<SOAP-ENV:Envelope xmlns:SOAP-ENV="http://schemas.xmlsoap.org/soap/envelope/" ' +
        'xmlns:SOAP-ENC="http://schemas.xmlsoap.org/soap/encoding/" xmlns:acsb="http://www.ifopt.org.uk/acsb" ' +
        'xmlns:datex2="http://datex2.eu/schema/1_0/1_0" xmlns:ifopt="http://www.ifopt.org.uk/ifopt" ' +
        `xmlns:siri="${SIRI_NAMESPACE_URI}" xmlns:siriWS="http://new.webservice.namespace" ` +
        'xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ' +
        'xsi:schemaLocation="./siri">' +
        '<SOAP-ENV:Header />' +
        '<SOAP-ENV:Body>' +
        '<siriWS:GetStopMonitoringService>' +
        '<Request xsi:type="siri:ServiceRequestStructure">' +
        `<siri:RequestTimestamp>${timestamp}</siri:RequestTimestamp>` +
        `<siri:RequestorRef xsi:type="siri:ParticipantRefStructure">${requestor}</siri:RequestorRef>` +
        `<siri:MessageIdentifier xsi:type="siri:MessageQualifierStructure">${requestor}:${numericTimestamp}</siri:MessageIdentifier>` +
        body +
        '</Request>' +
        '</siriWS:GetStopMonitoringService>' +
        '</SOAP-ENV:Body>' +
        '</SOAP-ENV:Envelope>';
}

/** GET URL for the JSON variant; all stops of a group go in one comma-joined MonitoringRef. */
export function encodeStopMonitoringUrl(
    baseUrl: string,
    stopCodes: readonly string[],
    maxVisits: number,
    requestorRef: string
): string {
    const url = new URL(baseUrl);
    url.searchParams.set('Key', requestorRef);
    url.searchParams.set('MonitoringRef', stopCodes.join(','));
    url.searchParams.set('PreviewInterval', PREVIEW_INTERVAL);
    url.searchParams.set('MaximumStopVisits', String(maxVisits));
    url.searchParams.set('StopVisitDetailLevel', 'normal');
    return url.toString();
}

// ── Tree helpers ──────────────────────────────────────────────────────────────

type Node = Record<string, unknown>;

const isNode = (value: unknown): value is Node =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Text of a leaf. xml2js puts text under `_` when the element also has attributes. */
const textOf = (value: unknown): string | undefined => {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (isNode(value)) return textOf(value._);
    return undefined;
};

/** Child by local name, whatever prefix the producer chose */
const childByLocalName = (node: Node, localName: string): Node | undefined => {
    for (const [key, value] of Object.entries(node)) {
        if ((key === localName || key.endsWith(`:${localName}`)) && isNode(value)) return value;
    }
    return undefined;
};

const namespaceDeclarations = (node: Node): Record<string, string> => {
    const declarations: Record<string, string> = {};
    const attributes = node.$;
    if (!isNode(attributes)) return declarations;
    for (const [name, value] of Object.entries(attributes)) {
        if ((name === 'xmlns' || name.startsWith('xmlns:')) && typeof value === 'string') {
            declarations[name] = value;
        }
    }
    return declarations;
};

/**
 * Prefix (with its trailing colon) bound to the SIRI namespace in a set of
 * xmlns declarations. Default namespace binding gives an empty prefix.
 */
export function discoverSiriPrefix(declarations: Record<string, string>): string {
    let prefix: string | null = null;
    for (const [attribute, uri] of Object.entries(declarations)) {
        if (uri !== SIRI_NAMESPACE_URI) continue;
        if (attribute === 'xmlns') prefix = '';
        else if (attribute.startsWith('xmlns:')) prefix = `${attribute.slice('xmlns:'.length)}:`;
    }
    return prefix ?? DEFAULT_SIRI_PREFIX;
}

// ── Decoding ──────────────────────────────────────────────────────────────────

interface Delivery {
    answer: Node;
    ns: string;
}

class VisitReader {
    constructor(private readonly ns: string, private readonly raw: string) { }

    child(node: Node, name: string): Node | undefined {
        const value = node[this.ns + name];
        return isNode(value) ? value : undefined;
    }

    requireChild(node: Node, name: string): Node {
        const value = this.child(node, name);
        if (!value) throw new DecodeError(`Missing ${this.ns}${name}`, this.raw);
        return value;
    }

    text(node: Node, name: string): string | null {
        const value = textOf(node[this.ns + name]);
        return value === undefined || value === '' ? null : value;
    }

    requireText(node: Node, name: string): string {
        const value = this.text(node, name);
        if (value === null) throw new DecodeError(`Missing ${this.ns}${name}`, this.raw);
        return value;
    }

    date(node: Node, name: string): Date | null {
        const value = this.text(node, name);
        if (value === null) return null;
        const parsed = parseISO(value);
        if (!isValid(parsed)) throw new DecodeError(`Bad timestamp in ${this.ns}${name}: ${value}`, this.raw);
        return parsed;
    }

    requireDate(node: Node, name: string): Date {
        const value = this.date(node, name);
        if (value === null) throw new DecodeError(`Missing ${this.ns}${name}`, this.raw);
        return value;
    }
}

/** "{DatedVehicleJourneyRef}_{ddMMyy of DataFrameRef}", the schedule's day-scoped trip id */
export function tripIdFromFramedJourney(dataFrameRef: string, datedVehicleJourneyRef: string): string | null {
    const tripDate = parseISO(dataFrameRef);
    if (!isValid(tripDate)) return null;
    return `${datedVehicleJourneyRef}_${format(tripDate, 'ddMMyy')}`;
}

function decodeVisit(src: Node, read: VisitReader): Visit {
    const journey = read.requireChild(src, 'MonitoredVehicleJourney');
    // Single MonitoredCall; onward calls are not requested
    const call = read.requireChild(journey, 'MonitoredCall');

    let tripId: string | null = null;
    const framed = read.child(journey, 'FramedVehicleJourneyRef');
    if (framed) {
        const dataFrameRef = read.text(framed, 'DataFrameRef');
        const datedRef = read.text(framed, 'DatedVehicleJourneyRef');
        if (dataFrameRef && datedRef) tripId = tripIdFromFramedJourney(dataFrameRef, datedRef);
    }

    let location: Location | null = null;
    const vehicleLocation = read.child(journey, 'VehicleLocation');
    if (vehicleLocation) {
        const lat = read.text(vehicleLocation, 'Latitude');
        const lon = read.text(vehicleLocation, 'Longitude');
        if (lat !== null && lon !== null && Number.isFinite(Number(lat)) && Number.isFinite(Number(lon))) {
            location = { lat: Number(lat), lon: Number(lon) };
        }
    }

    const routeId = read.requireText(journey, 'LineRef');

    return {
        producer: Producer.SIRI,
        stopCode: read.requireText(src, 'MonitoringRef'),
        routeId,
        lineId: routeId,
        directionId: read.text(journey, 'DirectionRef'),
        lineName: read.text(journey, 'PublishedLineName'),
        operatorId: read.text(journey, 'OperatorRef'),
        destinationId: read.text(journey, 'DestinationRef'),
        vehicleRef: read.text(journey, 'VehicleRef'),
        tripId,
        eta: read.requireDate(call, 'ExpectedArrivalTime'),
        departed: read.date(call, 'AimedDepartureTime') ?? read.date(journey, 'OriginAimedDepartureTime'),
        status: read.text(call, 'ArrivalStatus'),
        location,
        timestamp: read.requireDate(src, 'RecordedAtTime'),
        source: src,
    };
}

function decodeDeliveries(
    { answer, ns }: Delivery,
    raw: string,
    requestedStopCodes: readonly string[]
): AggregatedResponse {
    const read = new VisitReader(ns, raw);
    const response = new AggregatedResponse(requestedStopCodes, read.requireText(answer, 'ResponseTimestamp'));

    if (!((ns + 'StopMonitoringDelivery') in answer)) {
        throw new DecodeError(`Missing ${ns}StopMonitoringDelivery`, raw);
    }

    for (const delivery of oneOrMany(answer[ns + 'StopMonitoringDelivery'])) {
        if (!isNode(delivery)) throw new DecodeError('Malformed StopMonitoringDelivery', raw);

        if (read.text(delivery, 'Status') !== 'true') {
            const condition = read.child(delivery, 'ErrorCondition');
            const description = condition ? read.text(condition, 'Description') : null;
            response.errors.push(description ?? 'Stop monitoring delivery failed');
            continue;
        }

        for (const src of oneOrMany(delivery[ns + 'MonitoredStopVisit'])) {
            if (!isNode(src)) throw new DecodeError('Malformed MonitoredStopVisit', raw);
            const visit = decodeVisit(src, read);
            if (!response.addVisit(visit)) {
                console.warn(`[Siri] Dropping visit for unrequested stop ${visit.stopCode}`);
            }
        }
    }

    return response;
}

async function locateXmlDelivery(raw: string): Promise<Delivery> {
    let parsed: unknown;
    try {
        parsed = await parseStringPromise(raw, { explicitArray: false });
    } catch (e) {
        throw new DecodeError('Response is not well-formed XML', raw, { cause: e });
    }
    if (!isNode(parsed)) throw new DecodeError('Empty XML document', raw);

    const envelope = childByLocalName(parsed, 'Envelope');
    const body = envelope && childByLocalName(envelope, 'Body');
    const serviceResponse = body && childByLocalName(body, 'GetStopMonitoringServiceResponse');
    const answer = serviceResponse && childByLocalName(serviceResponse, 'Answer');
    if (!envelope || !body || !serviceResponse || !answer) {
        throw new DecodeError('Missing Envelope/Body/GetStopMonitoringServiceResponse/Answer', raw);
    }

    const ns = discoverSiriPrefix({
        ...namespaceDeclarations(envelope),
        ...namespaceDeclarations(body),
        ...namespaceDeclarations(serviceResponse),
        ...namespaceDeclarations(answer),
    });
    return { answer, ns };
}

function locateJsonDelivery(raw: string): Delivery {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e) {
        throw new DecodeError('Response is not valid JSON', raw, { cause: e });
    }
    const siri = isNode(parsed) ? childByLocalName(parsed, 'Siri') : undefined;
    const answer = siri && childByLocalName(siri, 'ServiceDelivery');
    if (!answer) throw new DecodeError('Missing Siri/ServiceDelivery', raw);
    return { answer, ns: '' };
}

/**
 * Decodes either wire variant. Every requested stop code is present in the
 * result. Schema mismatches are logged with the raw payload and rethrown.
 */
export async function decodeStopMonitoringResponse(
    raw: string,
    requestedStopCodes: readonly string[]
): Promise<AggregatedResponse> {
    try {
        const delivery = raw.trimStart().startsWith('{') ? locateJsonDelivery(raw) : await locateXmlDelivery(raw);
        return decodeDeliveries(delivery, raw, requestedStopCodes);
    } catch (e) {
        if (e instanceof DecodeError) {
            console.error(`[Siri] Could not decode response: ${e.message}`, raw);
        }
        throw e;
    }
}
