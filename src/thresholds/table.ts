import type { Station, StationId, ThresholdSet } from '../engine/types.js';

export interface ThresholdEntry {
    id?: StationId;
    name?: string;
    thresholds: ThresholdSet;
}

const REGION_SUFFIX = /\([A-Z]{2}\)\s*$/;

/**
 * Name key used when a threshold entry names its station instead of its id.
 * Ignores case, accents, repeated whitespace and the trailing region tag.
 */
export function normalizeStationName(name: string): string {
    return name
        .replace(REGION_SUFFIX, '')
        .normalize('NFD')
        .replace(/\p{M}/gu, '')
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

function describeEntry(entry: ThresholdEntry): string {
    return entry.id !== undefined ? `id ${entry.id}` : `name "${entry.name ?? ''}"`;
}

/**
 * Immutable lookup of per-station threshold triples. A station with no entry
 * is unmonitored.
 */
export class ThresholdTable {
    private readonly byId = new Map<StationId, ThresholdSet>();
    private readonly byName = new Map<string, ThresholdSet>();

    constructor(entries: readonly ThresholdEntry[]) {
        for (const entry of entries) {
            const [t1, t2, t3] = entry.thresholds;
            if (![t1, t2, t3].every(Number.isFinite) || t1 > t2 || t2 > t3) {
                throw new Error(
                    `Thresholds for ${describeEntry(entry)} must be finite and ascending, got [${entry.thresholds.join(', ')}]`,
                );
            }

            const thresholds: ThresholdSet = Object.freeze([t1, t2, t3] as const);

            if (entry.id !== undefined) {
                if (this.byId.has(entry.id)) {
                    throw new Error(`Duplicate threshold entry for station id ${entry.id}`);
                }
                this.byId.set(entry.id, thresholds);
            }

            if (entry.name !== undefined) {
                const key = normalizeStationName(entry.name);
                if (this.byName.has(key)) {
                    throw new Error(`Duplicate threshold entry for station name "${entry.name}"`);
                }
                this.byName.set(key, thresholds);
            }
        }
    }

    lookup(station: Station): ThresholdSet | undefined {
        return this.byId.get(station.id) ?? this.byName.get(normalizeStationName(station.name));
    }

    get size(): number {
        return new Set([...this.byId.values(), ...this.byName.values()]).size;
    }
}
