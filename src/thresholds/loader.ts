import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { ThresholdTable, type ThresholdEntry } from './table.js';

interface ThresholdFile {
    hysteresis?: number;
    stations: ThresholdEntry[];
}

export interface ThresholdConfig {
    table: ThresholdTable;
    hysteresis: number;
}

export function parseThresholdConfig(data: unknown, validator: SchemaValidator): ThresholdConfig {
    const result = validator.validateThresholdTable(data);
    if (!result.valid) {
        throw new Error(`Invalid threshold table: ${result.errors}`);
    }

    // Shape guaranteed by the threshold-table schema
    const file = data as ThresholdFile;

    return {
        table: new ThresholdTable(file.stations),
        hysteresis: file.hysteresis ?? 0,
    };
}

export function loadThresholds(thresholdsPath: string, validator: SchemaValidator): ThresholdConfig {
    try {
        const content = readFileSync(thresholdsPath, 'utf-8');
        const thresholds = parseThresholdConfig(JSON.parse(content), validator);

        logger.info(
            {
                thresholdsPath,
                stations: thresholds.table.size,
                hysteresis: thresholds.hysteresis,
            },
            'Threshold table loaded',
        );

        return thresholds;
    } catch (err) {
        logger.error({ thresholdsPath, error: err }, 'Failed to load threshold table');
        throw new Error(`Failed to load threshold table from ${thresholdsPath}: ${err}`);
    }
}
