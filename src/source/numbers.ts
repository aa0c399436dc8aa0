const MISSING_MARKERS = new Set(['', '-', '--', 'n/d', 'nd', 's/d']);

/**
 * Parse a level as printed by the source page ("0,93", "1.234,5", "1.500", "n/d").
 * Anything that is not a finite number comes back as `null`, which the
 * crossing engine treats as "not reported".
 */
export function parseSpanishDecimal(text: string): number | null {
    const cleaned = text.trim().replace(/\s*m$/i, '').trim();
    if (MISSING_MARKERS.has(cleaned.toLowerCase())) {
        return null;
    }

    // The page always prints a decimal comma; dots only group thousands
    const normalized = cleaned.replace(/\./g, '').replace(',', '.');

    if (!/^[+-]?\d+(\.\d+)?$/.test(normalized)) {
        return null;
    }

    const value = Number(normalized);
    return Number.isFinite(value) ? value : null;
}
