export type StationId = string;

export interface Station {
    id: StationId;
    name: string;
    regionTag?: string;
}

/** A `null` level means the station did not report this cycle. */
export interface Reading {
    station: Station;
    level: number | null;
}

export interface Snapshot {
    readings: Reading[];
    /** "Data updated at" stamp published by the source page, verbatim. */
    sourceUpdatedAt: string | null;
}

export type ThresholdSet = readonly [number, number, number];

export const ALERT_LEVELS = [0, 1, 2, 3] as const;
export type AlertLevel = (typeof ALERT_LEVELS)[number];
export type RaisedLevel = Exclude<AlertLevel, 0>;

export function isAlertLevel(value: unknown): value is AlertLevel {
    return ALERT_LEVELS.some((level) => level === value);
}

export interface AlertEvent {
    stationId: StationId;
    stationName: string;
    levelReached: RaisedLevel;
    /** Level held before this reading, after any rearm. */
    previousLevel: AlertLevel;
    levelValue: number;
    thresholdValue: number;
    timestamp: string;
}

export interface CrossingResult {
    nextLevel: AlertLevel;
    events: AlertEvent[];
}

/** Last heartbeat item published, re-emitted while the daily policy holds it back. */
export interface HeartbeatRecord {
    guid: string;
    publishedAt: string;
    description: string;
}

export interface AlertState {
    levels: Map<StationId, AlertLevel>;
    lastHeartbeat: HeartbeatRecord | null;
}

export function emptyAlertState(): AlertState {
    return { levels: new Map(), lastHeartbeat: null };
}
