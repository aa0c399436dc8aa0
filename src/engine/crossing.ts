import type {
    AlertEvent,
    AlertLevel,
    CrossingResult,
    RaisedLevel,
    Reading,
    ThresholdSet,
} from './types.js';

const RAISED_LEVELS: readonly RaisedLevel[] = [1, 2, 3];

/**
 * Highest level whose threshold the value meets. Level 0 is always reached.
 */
export function reachedLevel(value: number, thresholds: ThresholdSet): AlertLevel {
    const [t1, t2, t3] = thresholds;
    if (value >= t3) return 3;
    if (value >= t2) return 2;
    if (value >= t1) return 1;
    return 0;
}

export class CrossingEngine {
    constructor(private readonly hysteresis: number) {
        if (!Number.isFinite(hysteresis) || hysteresis < 0) {
            throw new Error(`Hysteresis must be a finite number >= 0, got ${hysteresis}`);
        }
    }

    /**
     * Decide the next alert level for one station and the crossings to report.
     *
     * Rearming runs first and never reports anything; the raise pass then
     * reports every level between the rearmed level and the reached one, in
     * ascending order. Both passes look at the same reading.
     */
    evaluate(
        reading: Reading,
        thresholds: ThresholdSet,
        prevLevel: AlertLevel,
        observedAt: string,
    ): CrossingResult {
        const value = reading.level;
        if (value === null || !Number.isFinite(value)) {
            return { nextLevel: prevLevel, events: [] };
        }

        const rearmed = this.rearm(value, thresholds, prevLevel);
        const reached = reachedLevel(value, thresholds);

        if (reached <= rearmed) {
            return { nextLevel: rearmed, events: [] };
        }

        const events: AlertEvent[] = RAISED_LEVELS
            .filter((level) => level > rearmed && level <= reached)
            .map((level) => ({
                stationId: reading.station.id,
                stationName: reading.station.name,
                levelReached: level,
                previousLevel: rearmed,
                levelValue: value,
                thresholdValue: thresholds[level - 1],
                timestamp: observedAt,
            }));

        return { nextLevel: reached, events };
    }

    /**
     * Lower the level while the value sits below the current level's threshold
     * minus the hysteresis margin. Cascades down to 0 within one call.
     */
    private rearm(value: number, thresholds: ThresholdSet, prevLevel: AlertLevel): AlertLevel {
        const [t1, t2, t3] = thresholds;
        let level: AlertLevel = prevLevel;

        if (level >= 3 && value < t3 - this.hysteresis) level = 2;
        if (level >= 2 && value < t2 - this.hysteresis) level = 1;
        if (level >= 1 && value < t1 - this.hysteresis) level = 0;

        return level;
    }
}
