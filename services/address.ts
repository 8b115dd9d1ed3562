/**
 * Stop address parsing
 * ─────────────────────────────────────────────────────────────────────────
 * Schedule stops encode their address in the description field as a labeled
 * string: "רחוב: הרצל 12 עיר: חיפה רציף:  קומה: ". Label sets live in
 * data/addressLabels.json, one per language; the first set that matches wins.
 */

import addressLabels from '../data/addressLabels.json';
import type { Stop, StopAddress } from '../types';

export interface AddressLabels {
    lang: string;
    street: string;
    city: string;
    platform: string;
    floor: string;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const compileAddressRule = (labels: AddressLabels): RegExp =>
    new RegExp(
        `^${escapeRegExp(labels.street)}(.*)${escapeRegExp(labels.city)}(.*)` +
        `${escapeRegExp(labels.platform)}(.*)${escapeRegExp(labels.floor)}(.*)$`,
        's'
    );

const DEFAULT_RULES: RegExp[] = (addressLabels satisfies AddressLabels[]).map(compileAddressRule);

export const parseAddress = (description: string, rules: readonly RegExp[] = DEFAULT_RULES): StopAddress => {
    const text = description.trim();
    for (const rule of rules) {
        const match = rule.exec(text);
        if (match) {
            const [, street = '', city = '', platform = '', floor = ''] = match;
            return { street: street.trim(), city: city.trim(), platform: platform.trim(), floor: floor.trim() };
        }
    }
    return {};
};

// Keyed by the stop row itself: a row's description never changes while it is alive
const parsed = new WeakMap<Stop, StopAddress>();

export const parseStopAddress = (stop: Stop): StopAddress => {
    let address = parsed.get(stop);
    if (!address) {
        address = parseAddress(stop.stopDesc);
        parsed.set(stop, address);
    }
    return address;
};
