import { existsSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import {
    emptyAlertState,
    isAlertLevel,
    type AlertLevel,
    type AlertState,
    type HeartbeatRecord,
    type StationId,
} from '../engine/types.js';

interface PersistedAlertState {
    levels: Record<StationId, AlertLevel>;
    lastHeartbeat?: HeartbeatRecord | null;
}

/**
 * Durable station → alert level mapping, one JSON file per deployment.
 * Not safe for concurrent writers: the last save wins.
 */
export class AlertStateStore {
    constructor(
        private readonly path: string,
        private readonly validator: SchemaValidator,
    ) { }

    /**
     * Load the persisted state. A missing, unreadable or invalid file yields an
     * empty state so the run can continue from the zero baseline.
     */
    load(): AlertState {
        if (!existsSync(this.path)) {
            logger.info({ path: this.path }, 'No alert state file, starting from empty state');
            return emptyAlertState();
        }

        let data: unknown;
        try {
            data = JSON.parse(readFileSync(this.path, 'utf-8'));
        } catch (err) {
            logger.warn({ path: this.path, error: err }, 'Alert state unreadable, resetting to empty state');
            return emptyAlertState();
        }

        const result = this.validator.validateAlertState(data);
        if (!result.valid) {
            logger.warn({ path: this.path, errors: result.errors }, 'Alert state invalid, resetting to empty state');
            return emptyAlertState();
        }

        // Shape guaranteed by the alert-state schema
        const persisted = data as PersistedAlertState;
        const levels = new Map<StationId, AlertLevel>();
        for (const [stationId, level] of Object.entries(persisted.levels)) {
            levels.set(stationId, level);
        }

        logger.debug({ path: this.path, stations: levels.size }, 'Alert state loaded');

        return {
            levels,
            lastHeartbeat: persisted.lastHeartbeat ?? null,
        };
    }

    /**
     * Persist the full state. Written to a sibling temp file first and renamed
     * over the target so a crash mid-write leaves the previous file intact.
     */
    save(state: AlertState): void {
        const entries = [...state.levels.entries()].sort(([a], [b]) => a.localeCompare(b));
        for (const [stationId, level] of entries) {
            if (!isAlertLevel(level)) {
                throw new Error(`Refusing to persist alert level ${level} for station ${stationId}`);
            }
        }

        // fromEntries defines own properties, so ids like "__proto__" survive
        const persisted: PersistedAlertState = {
            levels: Object.fromEntries(entries),
            lastHeartbeat: state.lastHeartbeat,
        };

        const tmpPath = `${this.path}.tmp`;
        writeFileSync(tmpPath, `${JSON.stringify(persisted, null, 2)}\n`, 'utf-8');
        renameSync(tmpPath, this.path);

        logger.debug({ path: this.path, stations: state.levels.size }, 'Alert state saved');
    }
}
