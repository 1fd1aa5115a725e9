// src/core/glyphs/glyphMapper.ts

import _ from 'lodash';
import type {
    DarknessTable,
    GlyphMode,
    IConversionSettings,
    IGlyphCell,
    IGlyphMapper,
    PixelColor,
    RandomSource,
} from '../../@types/index.ts';
import { luminanceOf, rgbToHex, toRGB } from '../../utils/color/colorUtils.ts';
import { pickRandom } from '../../utils/misc/random.ts';
import { InvalidConfigurationError } from '../../utils/errors/errors.ts';
import { DARKNESS_TABLE, findNearestEntry } from './darknessTable.ts';

/**
 * Escapes `&`, `<`, `>`, `"` and `'` so a glyph can be placed inside markup as is.
 */
export function escapeGlyph(glyph: string): string {
    return _.escape(glyph);
}

/**
 * Splits a character pool into glyphs by code point, so astral characters stay whole.
 *
 * @throws {InvalidConfigurationError} When the pool is empty.
 */
export function splitCharList(charList: string): string[] {
    const glyphs = Array.from(charList);
    if (glyphs.length === 0) {
        throw new InvalidConfigurationError('Character list must contain at least one character.');
    }
    return glyphs;
}

/**
 * Color mode: any glyph from the pool, carrying the tile's color.
 */
export class RandomGlyphMapper implements IGlyphMapper {
    private readonly glyphs: string[];

    constructor(
        charList: string,
        private readonly random: RandomSource,
    ) {
        this.glyphs = splitCharList(charList).map(escapeGlyph);
    }

    map(color: PixelColor): IGlyphCell {
        return { glyph: pickRandom(this.glyphs, this.random), color: rgbToHex(toRGB(color)) };
    }
}

/**
 * ASCII mode: the glyph shape carries the tile's luminance, every glyph shares one foreground color.
 */
export class DarknessGlyphMapper implements IGlyphMapper {
    constructor(
        private readonly foreground: string,
        private readonly table: DarknessTable = DARKNESS_TABLE,
    ) {}

    map(color: PixelColor): IGlyphCell {
        const normalized = Math.min(1, Math.max(0, luminanceOf(color) / 255));
        return { glyph: escapeGlyph(findNearestEntry(this.table, normalized).glyph), color: this.foreground };
    }
}

export function createGlyphMapper(
    mode: GlyphMode,
    settings: Pick<IConversionSettings, 'charList' | 'random' | 'asciiForeground'>,
): IGlyphMapper {
    switch (mode) {
        case 'random':
            return new RandomGlyphMapper(settings.charList, settings.random);
        case 'ascii':
            return new DarknessGlyphMapper(settings.asciiForeground);
    }
}
