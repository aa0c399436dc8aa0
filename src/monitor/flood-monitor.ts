import type { HeartbeatPolicy } from '../config/env.js';
import { logger } from '../config/logger.js';
import type { CrossingEngine } from '../engine/crossing.js';
import type { AlertEvent, AlertState, Reading, Station, StationId } from '../engine/types.js';
import {
    alertItem,
    heartbeatItem,
    heartbeatRecord,
    restoreHeartbeatItem,
    runKeyFor,
    type FeedItem,
    type RunContext,
} from '../feed/items.js';
import type { FeedSink } from '../feed/rss.js';
import type { CycleCounters, Metrics } from '../metrics/counter.js';
import type { ReadingSource } from '../source/http-source.js';
import type { AlertStateStore } from '../state/store.js';
import type { ThresholdTable } from '../thresholds/table.js';

export interface MonitorConfig {
    /** Region tags to monitor; empty means every region. */
    regions: string[];
    heartbeatPolicy: HeartbeatPolicy;
    link: string;
}

export interface CycleReport {
    runAt: Date;
    sourceUpdatedAt: string | null;
    events: AlertEvent[];
    heartbeat: boolean;
    counters: CycleCounters;
}

function utcDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export class FloodMonitor {
    constructor(
        private source: ReadingSource,
        private thresholds: ThresholdTable,
        private engine: CrossingEngine,
        private store: AlertStateStore,
        private feed: FeedSink,
        private metrics: Metrics,
        private config: MonitorConfig,
    ) { }

    /**
     * Fetch one snapshot, evaluate every monitored station, write the feed and
     * persist the updated state. A failing fetch rejects before anything is
     * written.
     */
    async runCycle(runAt: Date = new Date()): Promise<CycleReport> {
        this.metrics.reset();

        const snapshot = await this.source.fetchSnapshot();
        const state = this.store.load();
        const events = this.evaluateReadings(snapshot.readings, state, runAt.toISOString());

        const run: RunContext = {
            runKey: runKeyFor(snapshot.sourceUpdatedAt, runAt),
            runAt,
            sourceUpdatedAt: snapshot.sourceUpdatedAt,
            link: this.config.link,
        };

        const items: FeedItem[] = events.map((event) => alertItem(event, run));
        const heartbeat = events.length === 0 && this.heartbeatDue(state, runAt);
        if (heartbeat) {
            const item = heartbeatItem(run, this.metrics.getCounters().monitored);
            items.push(item);
            state.lastHeartbeat = heartbeatRecord(item);
            this.metrics.incrementHeartbeats();
        } else if (events.length === 0 && state.lastHeartbeat) {
            // Today's heartbeat stays in the feed until the next one is due
            items.push(restoreHeartbeatItem(state.lastHeartbeat, this.config.link));
        }

        this.feed.publish(items, runAt);
        this.store.save(state);

        const counters = this.metrics.getCounters();
        logger.info({ counters, sourceUpdatedAt: snapshot.sourceUpdatedAt }, 'Cycle complete');

        return {
            runAt,
            sourceUpdatedAt: snapshot.sourceUpdatedAt,
            events,
            heartbeat,
            counters,
        };
    }

    private evaluateReadings(
        readings: readonly Reading[],
        state: AlertState,
        observedAt: string,
    ): AlertEvent[] {
        const events: AlertEvent[] = [];
        const seen = new Set<StationId>();

        for (const reading of readings) {
            this.metrics.incrementReadings();
            const { station } = reading;

            if (seen.has(station.id)) {
                logger.warn({ stationId: station.id }, 'Duplicate station row in snapshot, ignored');
                continue;
            }
            seen.add(station.id);

            if (!this.inRegion(station)) {
                this.metrics.incrementOutsideRegion();
                continue;
            }

            const thresholds = this.thresholds.lookup(station);
            if (!thresholds) {
                this.metrics.incrementUnmonitored();
                logger.debug({ stationId: station.id, name: station.name }, 'Station has no thresholds, skipped');
                continue;
            }

            this.metrics.incrementMonitored();
            if (reading.level === null) {
                this.metrics.incrementAbsent();
            }

            const prevLevel = state.levels.get(station.id) ?? 0;
            const result = this.engine.evaluate(reading, thresholds, prevLevel, observedAt);
            state.levels.set(station.id, result.nextLevel);

            if (result.nextLevel !== prevLevel) {
                logger.info(
                    {
                        stationId: station.id,
                        name: station.name,
                        level: reading.level,
                        from: prevLevel,
                        to: result.nextLevel,
                    },
                    result.events.length > 0 ? 'Threshold crossed' : 'Station rearmed',
                );
            }

            this.metrics.addEvents(result.events.length);
            events.push(...result.events);
        }

        return events;
    }

    private inRegion(station: Station): boolean {
        if (this.config.regions.length === 0) {
            return true;
        }
        return station.regionTag !== undefined && this.config.regions.includes(station.regionTag);
    }

    private heartbeatDue(state: AlertState, runAt: Date): boolean {
        if (this.config.heartbeatPolicy === 'every-run') {
            return true;
        }
        return state.lastHeartbeat === null
            || utcDate(new Date(state.lastHeartbeat.publishedAt)) !== utcDate(runAt);
    }
}
