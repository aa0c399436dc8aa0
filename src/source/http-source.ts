import axios from 'axios';
import { logger } from '../config/logger.js';
import type { Snapshot } from '../engine/types.js';
import { parseSnapshot } from './parser.js';

export interface ReadingSource {
    fetchSnapshot(): Promise<Snapshot>;
}

export interface HttpSourceConfig {
    url: string;
    timeoutMs: number;
    userAgent: string;
}

/**
 * Fetches the rivers summary page and parses it. Network and HTTP errors
 * propagate to the caller; there is no retry.
 */
export class HttpReadingSource implements ReadingSource {
    constructor(private readonly config: HttpSourceConfig) { }

    async fetchSnapshot(): Promise<Snapshot> {
        const startedAt = Date.now();

        const response = await axios.get<string>(this.config.url, {
            timeout: this.config.timeoutMs,
            responseType: 'text',
            headers: { 'User-Agent': this.config.userAgent },
        });

        const snapshot = parseSnapshot(response.data);

        logger.info(
            {
                url: this.config.url,
                status: response.status,
                stations: snapshot.readings.length,
                sourceUpdatedAt: snapshot.sourceUpdatedAt,
                durationMs: Date.now() - startedAt,
            },
            'Fetched station readings',
        );

        if (snapshot.readings.length === 0) {
            throw new Error(`No station rows found in ${this.config.url}`);
        }

        return snapshot;
    }
}
