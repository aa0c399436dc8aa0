import type { AlertEvent, HeartbeatRecord } from '../engine/types.js';

const HEARTBEAT_TITLE = 'No threshold crossings';

export interface FeedItem {
    title: string;
    link: string;
    guid: string;
    pubDate: Date;
    description: string;
}

export interface RunContext {
    /** Identifies the run in item guids: the source's update stamp, else the run time. */
    runKey: string;
    runAt: Date;
    sourceUpdatedAt: string | null;
    link: string;
}

export function runKeyFor(sourceUpdatedAt: string | null, runAt: Date): string {
    return (sourceUpdatedAt ?? runAt.toISOString()).replace(/\s+/g, 'T');
}

function metres(value: number): string {
    return `${value.toFixed(2)} m`;
}

export function eventGuid(event: AlertEvent, runKey: string): string {
    return `cross-${event.stationId}-L${event.levelReached}-${runKey}`;
}

export function alertItem(event: AlertEvent, run: RunContext): FeedItem {
    return {
        title: `Level ${event.levelReached} reached: ${event.stationName}`,
        link: run.link,
        guid: eventGuid(event, run.runKey),
        pubDate: run.runAt,
        description:
            `Station ${event.stationName} (${event.stationId}): mean level ${metres(event.levelValue)} ` +
            `reached level ${event.levelReached} from level ${event.previousLevel} ` +
            `(threshold ${metres(event.thresholdValue)}). ` +
            `Data updated at: ${run.sourceUpdatedAt ?? 'n/a'}.`,
    };
}

export function heartbeatItem(run: RunContext, monitoredStations: number): FeedItem {
    return {
        title: HEARTBEAT_TITLE,
        link: run.link,
        guid: `heartbeat-${run.runAt.toISOString()}`,
        pubDate: run.runAt,
        description:
            `Checked ${monitoredStations} monitored station(s); none crossed a new level. ` +
            `Data updated at: ${run.sourceUpdatedAt ?? 'n/a'}.`,
    };
}

export function heartbeatRecord(item: FeedItem): HeartbeatRecord {
    return {
        guid: item.guid,
        publishedAt: item.pubDate.toISOString(),
        description: item.description,
    };
}

/** Rebuild a heartbeat published by an earlier run so the feed keeps it. */
export function restoreHeartbeatItem(record: HeartbeatRecord, link: string): FeedItem {
    return {
        title: HEARTBEAT_TITLE,
        link,
        guid: record.guid,
        pubDate: new Date(record.publishedAt),
        description: record.description,
    };
}
