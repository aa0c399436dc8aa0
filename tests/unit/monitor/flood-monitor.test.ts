import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { CrossingEngine } from '../../../src/engine/crossing.js';
import type { Reading, Snapshot } from '../../../src/engine/types.js';
import type { FeedItem } from '../../../src/feed/items.js';
import { FeedPublisher, type FeedSink } from '../../../src/feed/rss.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { FloodMonitor, type MonitorConfig } from '../../../src/monitor/flood-monitor.js';
import type { ReadingSource } from '../../../src/source/http-source.js';
import { AlertStateStore } from '../../../src/state/store.js';
import { ThresholdTable } from '../../../src/thresholds/table.js';

const LINK = 'https://example.test/saih/rios';
const STAMP = '12-01-2026 13:00:00';

class FakeSource implements ReadingSource {
    constructor(public snapshot: Snapshot) { }

    async fetchSnapshot(): Promise<Snapshot> {
        return this.snapshot;
    }
}

class RecordingFeed implements FeedSink {
    published: FeedItem[][] = [];

    publish(items: readonly FeedItem[]): void {
        this.published.push([...items]);
    }
}

function reading(id: string, level: number | null, regionTag = 'MA'): Reading {
    return { station: { id, name: `Estación ${id} (${regionTag})`, regionTag }, level };
}

function snapshot(...readings: Reading[]): Snapshot {
    return { readings, sourceUpdatedAt: STAMP };
}

describe('FloodMonitor', () => {
    const validator = new SchemaValidator('./contracts');
    const table = new ThresholdTable([
        { id: '1', thresholds: [1, 2, 3] },
        { id: '2', thresholds: [0.5, 1, 1.5] },
    ]);

    let dir: string;
    let statePath: string;
    let store: AlertStateStore;
    let feed: RecordingFeed;

    const createMonitor = (source: ReadingSource, overrides: Partial<MonitorConfig> = {}) =>
        new FloodMonitor(source, table, new CrossingEngine(0), store, feed, new Metrics(), {
            regions: [],
            heartbeatPolicy: 'every-run',
            link: LINK,
            ...overrides,
        });

    const savedState = () => JSON.parse(readFileSync(statePath, 'utf-8'));

    beforeAll(() => {
        validator.loadSchemas();
    });

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'flood-monitor-'));
        statePath = join(dir, 'state.json');
        store = new AlertStateStore(statePath, validator);
        feed = new RecordingFeed();
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should publish one item per crossed level and persist the new level', async () => {
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', 2.5), reading('2', 0.2))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events.map((e) => [e.stationId, e.levelReached, e.thresholdValue])).toEqual([
            ['1', 1, 1],
            ['1', 2, 2],
        ]);
        expect(report.heartbeat).toBe(false);
        expect(feed.published).toHaveLength(1);
        expect(feed.published[0].map((item) => item.guid)).toEqual([
            'cross-1-L1-12-01-2026T13:00:00',
            'cross-1-L2-12-01-2026T13:00:00',
        ]);
        expect(savedState()).toEqual({ levels: { '1': 2, '2': 0 }, lastHeartbeat: null });
    });

    it('should not alert again on an unchanged re-run and emit a heartbeat instead', async () => {
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', 2.5))));

        await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));
        const second = await monitor.runCycle(new Date('2026-10-18T11:00:00.000Z'));

        expect(second.events).toEqual([]);
        expect(second.heartbeat).toBe(true);
        expect(feed.published[1]).toHaveLength(1);
        expect(feed.published[1][0].guid).toBe('heartbeat-2026-10-18T11:00:00.000Z');
        expect(savedState()).toEqual({
            levels: { '1': 2 },
            lastHeartbeat: {
                guid: 'heartbeat-2026-10-18T11:00:00.000Z',
                publishedAt: '2026-10-18T11:00:00.000Z',
                description: 'Checked 1 monitored station(s); none crossed a new level. Data updated at: 12-01-2026 13:00:00.',
            },
        });
    });

    it('should leave stored levels of unmonitored stations untouched', async () => {
        writeFileSync(statePath, JSON.stringify({ levels: { '99': 3, '1': 1 } }), 'utf-8');
        const monitor = createMonitor(new FakeSource(snapshot(reading('99', 0), reading('1', 1.2))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events).toEqual([]);
        expect(report.counters.unmonitored).toBe(1);
        expect(report.counters.monitored).toBe(1);
        expect(savedState().levels).toEqual({ '1': 1, '99': 3 });
    });

    it('should keep the level of a station that did not report', async () => {
        writeFileSync(statePath, JSON.stringify({ levels: { '1': 3 } }), 'utf-8');
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', null))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events).toEqual([]);
        expect(report.counters.absent).toBe(1);
        expect(savedState().levels).toEqual({ '1': 3 });
    });

    it('should rearm a station silently when its level drops', async () => {
        writeFileSync(statePath, JSON.stringify({ levels: { '1': 3 } }), 'utf-8');
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', 0.4))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events).toEqual([]);
        expect(report.heartbeat).toBe(true);
        expect(savedState().levels).toEqual({ '1': 0 });
    });

    it('should skip stations outside the configured regions', async () => {
        const monitor = createMonitor(
            new FakeSource(snapshot(reading('1', 3.5, 'CA'), reading('2', 0.7, 'MA'))),
            { regions: ['MA'] },
        );

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events.map((e) => [e.stationId, e.levelReached])).toEqual([['2', 1]]);
        expect(report.counters.outside_region).toBe(1);
        expect(savedState().levels).toEqual({ '2': 1 });
    });

    it('should emit at most one heartbeat per UTC day under the daily policy', async () => {
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', 0.2))), { heartbeatPolicy: 'daily' });

        const morning = await monitor.runCycle(new Date('2026-10-18T08:00:00.000Z'));
        const evening = await monitor.runCycle(new Date('2026-10-18T22:00:00.000Z'));
        const nextDay = await monitor.runCycle(new Date('2026-10-19T01:00:00.000Z'));

        expect([morning.heartbeat, evening.heartbeat, nextDay.heartbeat]).toEqual([true, false, true]);
        expect(feed.published.map((items) => items.map((item) => item.guid))).toEqual([
            ['heartbeat-2026-10-18T08:00:00.000Z'],
            ['heartbeat-2026-10-18T08:00:00.000Z'],
            ['heartbeat-2026-10-19T01:00:00.000Z'],
        ]);
        expect(feed.published[1][0].pubDate).toEqual(new Date('2026-10-18T08:00:00.000Z'));
        expect(savedState().lastHeartbeat.publishedAt).toBe('2026-10-19T01:00:00.000Z');
    });

    it('should keep the day\'s heartbeat in the written feed on quiet runs under the daily policy', async () => {
        const feedPath = join(dir, 'rss.xml');
        const monitor = new FloodMonitor(
            new FakeSource(snapshot(reading('1', 0.2))),
            table,
            new CrossingEngine(0),
            store,
            new FeedPublisher(feedPath, { title: 'River alerts', link: LINK, description: 'Levels' }),
            new Metrics(),
            { regions: [], heartbeatPolicy: 'daily', link: LINK },
        );

        await monitor.runCycle(new Date('2026-10-18T08:00:00.000Z'));
        await monitor.runCycle(new Date('2026-10-18T09:00:00.000Z'));
        const xml = readFileSync(feedPath, 'utf-8');

        expect(xml).toContain('<guid isPermaLink="false">heartbeat-2026-10-18T08:00:00.000Z</guid>');
        expect(xml).toContain('<pubDate>Sun, 18 Oct 2026 08:00:00 GMT</pubDate>');
        expect(xml).toContain('<lastBuildDate>Sun, 18 Oct 2026 09:00:00 GMT</lastBuildDate>');
    });

    it('should start from an empty state when the state file is corrupt', async () => {
        writeFileSync(statePath, 'not json', 'utf-8');
        const monitor = createMonitor(new FakeSource(snapshot(reading('2', 1.6))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events.map((e) => e.levelReached)).toEqual([1, 2, 3]);
        expect(savedState().levels).toEqual({ '2': 3 });
    });

    it('should evaluate a station only once when the snapshot repeats it', async () => {
        const monitor = createMonitor(new FakeSource(snapshot(reading('1', 1.5), reading('1', 3.5))));

        const report = await monitor.runCycle(new Date('2026-10-18T10:00:00.000Z'));

        expect(report.events.map((e) => e.levelReached)).toEqual([1]);
        expect(report.counters.readings).toBe(2);
        expect(savedState().levels).toEqual({ '1': 1 });
    });

    it('should write nothing when the source fails', async () => {
        const publish = vi.fn();
        const failingSource: ReadingSource = {
            fetchSnapshot: () => Promise.reject(new Error('Request failed with status code 503')),
        };
        const monitor = new FloodMonitor(
            failingSource,
            table,
            new CrossingEngine(0),
            store,
            { publish },
            new Metrics(),
            { regions: [], heartbeatPolicy: 'every-run', link: LINK },
        );

        await expect(monitor.runCycle()).rejects.toThrow('Request failed with status code 503');
        expect(publish).not.toHaveBeenCalled();
        expect(existsSync(statePath)).toBe(false);
    });
});
