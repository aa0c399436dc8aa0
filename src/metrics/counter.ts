export interface CycleCounters {
    readings: number;
    monitored: number;
    outside_region: number;
    unmonitored: number;
    absent: number;
    events: number;
    heartbeats: number;
}

function zeroCounters(): CycleCounters {
    return {
        readings: 0,
        monitored: 0,
        outside_region: 0,
        unmonitored: 0,
        absent: 0,
        events: 0,
        heartbeats: 0,
    };
}

export class Metrics {
    private counters = zeroCounters();

    incrementReadings(): void {
        this.counters.readings++;
    }

    incrementMonitored(): void {
        this.counters.monitored++;
    }

    incrementOutsideRegion(): void {
        this.counters.outside_region++;
    }

    incrementUnmonitored(): void {
        this.counters.unmonitored++;
    }

    incrementAbsent(): void {
        this.counters.absent++;
    }

    addEvents(count: number): void {
        this.counters.events += count;
    }

    incrementHeartbeats(): void {
        this.counters.heartbeats++;
    }

    getCounters(): CycleCounters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = zeroCounters();
    }
}
