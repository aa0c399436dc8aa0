import { load } from 'cheerio';
import type { Reading, Snapshot } from '../engine/types.js';
import { parseSpanishDecimal } from './numbers.js';

const LAST_UPDATE_PATTERN = /Datos actualizados a:\s*(\d{2}-\d{2}-\d{4}\s+\d{2}:\d{2}:\d{2})/;
const REGION_TAG_PATTERN = /\(([A-Z]{2})\)\s*$/;

// Columns of the rivers summary table
const COL_ID = 0;
const COL_NAME = 1;
const COL_LEVEL = 2;

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function extractLastUpdate(html: string): string | null {
    const match = LAST_UPDATE_PATTERN.exec(html);
    return match ? collapseWhitespace(match[1]) : null;
}

/**
 * Read station rows from the first table of the page, skipping the header row
 * and rows with fewer than three cells.
 */
export function parseStationTable(html: string): Reading[] {
    const $ = load(html);
    const table = $('table').first();
    if (table.length === 0) {
        return [];
    }

    const readings: Reading[] = [];

    table.find('tr').slice(1).each((_, row) => {
        const cells = $(row).find('td');
        if (cells.length <= COL_LEVEL) {
            return;
        }

        const id = collapseWhitespace(cells.eq(COL_ID).text());
        const name = collapseWhitespace(cells.eq(COL_NAME).text());
        if (!id) {
            return;
        }

        const region = REGION_TAG_PATTERN.exec(name);

        readings.push({
            station: region ? { id, name, regionTag: region[1] } : { id, name },
            level: parseSpanishDecimal(cells.eq(COL_LEVEL).text()),
        });
    });

    return readings;
}

export function parseSnapshot(html: string): Snapshot {
    return {
        readings: parseStationTable(html),
        sourceUpdatedAt: extractLastUpdate(html),
    };
}
