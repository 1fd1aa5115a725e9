// src/core/glyphs/darknessTable.ts

import { readFileSync } from 'node:fs';
import type { DarknessTable, IDarknessEntry } from '../../@types/index.ts';
import { InternalInvariantViolationError } from '../../utils/errors/errors.ts';

const tableUrl = new URL('./data/darknessTable.json', import.meta.url);

function isDarknessEntry(value: unknown): value is IDarknessEntry {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'position' in value && typeof value.position === 'number' &&
        'darkness' in value && typeof value.darkness === 'number' &&
        'glyph' in value && typeof value.glyph === 'string' &&
        value.darkness >= 0 &&
        value.darkness <= 1;
}

/**
 * Validates raw table data: every entry well formed, positions matching their index and darkness
 * never decreasing.
 *
 * @throws {InternalInvariantViolationError} When the data breaks one of these rules.
 */
export function parseDarknessTable(raw: unknown): DarknessTable {
    if (!Array.isArray(raw) || raw.length === 0) {
        throw new InternalInvariantViolationError('Darkness table must be a non-empty array.');
    }
    const entries: IDarknessEntry[] = [];
    raw.forEach((value: unknown, index: number) => {
        if (!isDarknessEntry(value) || value.position !== index) {
            throw new InternalInvariantViolationError(`Malformed darkness table entry at position ${index}.`);
        }
        if (index > 0 && value.darkness < entries[index - 1].darkness) {
            throw new InternalInvariantViolationError(`Darkness table is not sorted at position ${index}.`);
        }
        entries.push(Object.freeze({ position: value.position, darkness: value.darkness, glyph: value.glyph }));
    });
    return Object.freeze(entries);
}

/**
 * Glyphs ordered from darkest (empty) to lightest (densest ink), as seen with a light foreground on
 * a dark background.
 */
export const DARKNESS_TABLE: DarknessTable = parseDarknessTable(JSON.parse(readFileSync(tableUrl, 'utf-8')));

/**
 * Entry whose darkness is closest to `value` (normalized luminance in 0..1). Binary search for the
 * first entry not below `value`, then the nearer of it and its predecessor; the predecessor wins a tie.
 */
export function findNearestEntry(table: DarknessTable, value: number): IDarknessEntry {
    let low = 0;
    let high = table.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (table[mid].darkness < value) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }

    if (low === 0) {
        return table[0];
    }
    if (low === table.length) {
        return table[table.length - 1];
    }
    const previous = table[low - 1];
    const next = table[low];
    return value - previous.darkness <= next.darkness - value ? previous : next;
}
